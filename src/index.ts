export { runApply, type ApplyOptions, type ApplyOutcome, type ApplyStatus, type RunContext } from "./apply/orchestrator.js";
export { readStatus, runAbort, runBranch, runCheck, runPromote, type CommandOutcome } from "./apply/commands.js";
export { ConfigSchema, defaultConfig, loadConfig, parseConfig, type GateConfig } from "./config.js";
export { parseDelivery } from "./delivery/parser.js";
export type { Delivery, FileBody, ManifestEntry, Operation, ParseResult, Plan } from "./delivery/types.js";
export * from "./errors.js";
export { EventLog, readEvents, type EventFields, type EventTag, type StoredEvent } from "./events.js";
export { ExitCode, exitCodeFor } from "./exit.js";
export { applyPatchSet, applyInstruction, mergePatchDocuments } from "./patch/apply.js";
export { detectPatchFormat, parsePatchDocument, serializePatchDocument } from "./patch/parse.js";
export type * from "./patch/types.js";
export { StageManager, type Stage } from "./stage/manager.js";
export { promote, type PromoteIO, type PromoteResult } from "./stage/promote.js";
export { shouldPreserve } from "./stage/preserve.js";
export { fingerprint } from "./utils/hash.js";
export { createConsoleLogger, silentLogger, type Logger } from "./utils/log.js";
export { validateContent } from "./validate/content.js";
export { validateDelivery } from "./validate/delivery.js";
export { validatePath } from "./validate/path.js";
export type { StructuralScanner } from "./verify/scanner.js";

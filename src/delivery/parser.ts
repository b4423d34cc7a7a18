import { GateError, errorMessage } from "../errors.js";
import { mergePatchDocuments } from "../patch/apply.js";
import { parsePatchDocument } from "../patch/parse.js";
import type { PatchDocument } from "../patch/types.js";
import { canonicalDeliveryPath } from "../utils/paths.js";
import type { Delivery, FileBody, ManifestEntry, Operation, Plan, ParseResult } from "./types.js";

type BlockTag = "plan" | "delivery" | "file" | "patch";

interface RawBlock {
  tag: BlockTag;
  attributes: Record<string, string>;
  body: string[];
  /** 1-based line of the open marker. */
  line: number;
}

const OPEN_MARKER = /^<(plan|delivery|file|patch)(\s[^>]*)?>$/i;
const ATTRIBUTE = /([A-Za-z_][\w-]*)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/g;
const FENCE = /^\s*(```|~~~)/;

/** Block keywords that may not double as file paths. */
export const RESERVED_PATHS = ["PLAN", "MANIFEST", "DELIVERY", "FILE", "PATCH", "END"];

function parseError(message: string): GateError {
  return new GateError(message, "parse");
}

function parseAttributes(source: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of source.matchAll(ATTRIBUTE)) {
    attributes[match[1].toLowerCase()] = match[2] ?? match[3] ?? match[4] ?? "";
  }
  return attributes;
}

function toBlockTag(name: string): BlockTag {
  const lower = name.toLowerCase();
  switch (lower) {
    case "plan":
    case "delivery":
    case "file":
    case "patch":
      return lower;
    default:
      throw parseError(`Unknown block marker <${name}>`);
  }
}

/**
 * Splits the raw text into marker-delimited blocks. Markers count only when
 * they fill their whole line; everything outside a block is ignored.
 */
function scanBlocks(text: string): RawBlock[] {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  const blocks: RawBlock[] = [];
  let i = 0;
  while (i < lines.length) {
    const open = OPEN_MARKER.exec(lines[i].trim());
    if (!open) {
      i++;
      continue;
    }
    const tag = toBlockTag(open[1]);
    const closeMarker = `</${tag}>`;
    const start = i;
    const body: string[] = [];
    i++;
    while (i < lines.length && lines[i].trim().toLowerCase() !== closeMarker) {
      body.push(lines[i]);
      i++;
    }
    if (i >= lines.length) {
      throw parseError(`Unclosed <${tag}> block opened at line ${start + 1} (expected ${closeMarker} on its own line)`);
    }
    blocks.push({ tag, attributes: parseAttributes(open[2] ?? ""), body, line: start + 1 });
    i++;
  }
  return blocks;
}

/** Drops one outer markdown fence wrapping the whole body. */
export function stripOuterFence(lines: string[]): string[] {
  let first = 0;
  let last = lines.length - 1;
  while (first <= last && lines[first].trim() === "") {
    first++;
  }
  while (last >= first && lines[last].trim() === "") {
    last--;
  }
  if (last > first && FENCE.test(lines[first]) && FENCE.test(lines[last]) && lines[last].trim().length <= 4) {
    return lines.slice(first + 1, last);
  }
  return lines;
}

function toFileBody(lines: string[]): FileBody {
  const kept = stripOuterFence(lines);
  const content = kept.length > 0 ? `${kept.join("\n")}\n` : "";
  return { content, lineCount: kept.length };
}

function parseManifestLine(line: string): ManifestEntry | null {
  let clean = line.trim().replace(/^[-*+]\s*/, "").replace(/^\d+[.)]\s*/, "").trim();
  if (clean === "") {
    return null;
  }
  let operation: Operation = "update";
  if (/\[new\]/i.test(clean)) {
    operation = "new";
    clean = clean.replace(/\[new\]/gi, "");
  } else if (/\[delete\]/i.test(clean)) {
    operation = "delete";
    clean = clean.replace(/\[delete\]/gi, "");
  }
  const [token = ""] = clean.trim().split(/\s+/);
  const rawPath = token.replace(/^`+|`+$/g, "");
  if (rawPath === "") {
    return null;
  }
  return { path: canonicalDeliveryPath(rawPath), operation };
}

function parsePlan(lines: string[]): Plan {
  const text = lines.join("\n").trim();
  const goalLine = lines.map((line) => line.trim()).find((line) => /^goal:/i.test(line));
  const goal = goalLine?.slice("goal:".length).trim();
  return goal ? { text, goal } : { text };
}

function assertNotReserved(path: string, block: RawBlock): void {
  if (RESERVED_PATHS.includes(path.toUpperCase())) {
    throw parseError(`<${block.tag}> block at line ${block.line} uses reserved keyword '${path}' as its path`);
  }
}

/**
 * Extracts the plan, manifest, file bodies and patches from free-form text.
 * Blocks compose additively. When no manifest block is present the manifest
 * is derived from the file and patch blocks in order.
 */
export function parseDelivery(text: string): ParseResult {
  const warnings: string[] = [];
  const blocks = scanBlocks(text);
  const manifest: ManifestEntry[] = [];
  const files = new Map<string, FileBody>();
  const patchDocs = new Map<string, PatchDocument[]>();
  const blockOrder: string[] = [];
  let plan: Plan | undefined;
  let sawManifest = false;

  for (const block of blocks) {
    switch (block.tag) {
      case "plan":
        if (plan) {
          warnings.push(`Additional <plan> block at line ${block.line} ignored`);
        } else {
          plan = parsePlan(block.body);
        }
        break;
      case "delivery":
        sawManifest = true;
        for (const line of block.body) {
          const entry = parseManifestLine(line);
          if (entry) {
            manifest.push(entry);
          }
        }
        break;
      case "file":
      case "patch": {
        const rawPath = block.attributes.path;
        if (rawPath === undefined || rawPath.trim() === "") {
          warnings.push(`<${block.tag}> block at line ${block.line} has no path attribute; skipped`);
          break;
        }
        const path = canonicalDeliveryPath(rawPath);
        assertNotReserved(path, block);
        if (files.has(path)) {
          throw parseError(`Duplicate delivery for ${path}: a <file> block was already given`);
        }
        if (block.tag === "file") {
          if (patchDocs.has(path)) {
            throw parseError(`Duplicate delivery for ${path}: both <patch> and <file> blocks were given`);
          }
          files.set(path, toFileBody(block.body));
        } else {
          const docs = patchDocs.get(path) ?? [];
          docs.push(parsePatchBlock(path, block));
          patchDocs.set(path, docs);
        }
        if (!blockOrder.includes(path)) {
          blockOrder.push(path);
        }
        break;
      }
    }
  }

  if (!sawManifest && blockOrder.length > 0) {
    warnings.push("No <delivery> manifest found; derived one from the file and patch blocks");
    for (const path of blockOrder) {
      manifest.push({ path, operation: "update" });
    }
  }
  if (manifest.length === 0) {
    throw parseError("No delivery found: expected a <delivery> manifest or <file>/<patch> blocks on their own lines");
  }

  const patches = new Map(
    [...patchDocs].map(([path, docs]) => [path, mergePatchDocuments(path, docs)] as const)
  );
  const delivery: Delivery = { manifest, files, patches };
  if (plan) {
    delivery.plan = plan;
  }
  return { delivery, warnings };
}

function parsePatchBlock(path: string, block: RawBlock): PatchDocument {
  const body = stripOuterFence(block.body).join("\n");
  try {
    return parsePatchDocument(body);
  } catch (err) {
    if (err instanceof GateError) {
      throw new GateError(`Patch for ${path} (line ${block.line}): ${err.message}`, err.code);
    }
    throw parseError(`Patch for ${path} (line ${block.line}): ${errorMessage(err)}`);
  }
}

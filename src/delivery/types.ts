import type { PatchSet } from "../patch/types.js";

export type Operation = "new" | "update" | "delete";

export interface ManifestEntry {
  path: string;
  operation: Operation;
}

export interface FileBody {
  content: string;
  lineCount: number;
}

export interface Plan {
  text: string;
  /** Value of the `GOAL:` line, when present. */
  goal?: string;
}

export interface Delivery {
  plan?: Plan;
  /** In delivery order; write order follows it. */
  manifest: ManifestEntry[];
  files: Map<string, FileBody>;
  patches: Map<string, PatchSet>;
}

export interface ParseResult {
  delivery: Delivery;
  warnings: string[];
}

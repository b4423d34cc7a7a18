export type PatchFormat = "v0" | "v1";

export interface SearchReplaceInstruction {
  format: "v0";
  search: string;
  replace: string;
}

export interface ContextAnchoredInstruction {
  format: "v1";
  leftCtx: string;
  old: string;
  rightCtx: string;
  new: string;
}

export type PatchInstruction = SearchReplaceInstruction | ContextAnchoredInstruction;

export interface PatchDocument {
  format: PatchFormat;
  /** Lowercase hex fingerprint the target must have before the first instruction. */
  baseSha256?: string;
  instructions: PatchInstruction[];
}

/** Every patch document addressed to one path, merged in delivery order. */
export interface PatchSet {
  baseSha256?: string;
  instructions: PatchInstruction[];
}

export interface ResolvedInstruction {
  search: string;
  replace: string;
  leftCtx?: string;
}

import { z } from "zod";

export const TouchKindSchema = z.enum(["Write", "Delete"]);

export type TouchKind = z.infer<typeof TouchKindSchema>;

const TouchedPathSchema = z
  .object({
    path: z.string().min(1),
    kind: TouchKindSchema
  })
  .passthrough();

export type TouchedPath = z.infer<typeof TouchedPathSchema>;

/** state.json. Unknown fields survive a read-modify-write cycle. */
export const StageStateSchema = z
  .object({
    id: z.string().min(1),
    /** Unix seconds. */
    created_at: z.number().int().nonnegative(),
    updated_at: z.number().int().nonnegative().optional(),
    touched: z.array(TouchedPathSchema).default([]),
    apply_count: z.number().int().nonnegative().default(0)
  })
  .passthrough();

export type StageState = z.infer<typeof StageStateSchema>;

export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/** Upserts a touch; the latest kind for a path wins and its position is kept. */
export function upsertTouch(state: StageState, path: string, kind: TouchKind): void {
  const existing = state.touched.find((entry) => entry.path === path);
  if (existing) {
    existing.kind = kind;
  } else {
    state.touched.push({ path, kind });
  }
}

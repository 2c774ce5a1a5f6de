import { z } from 'zod';

// Board dimensions validation
export const BoardDimensionsSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const CellOffsetSchema = z.object({
  dx: z.number().int().min(0),
  dy: z.number().int().min(0),
});

// Piece offsets validation
// NOTE: offsets are relative to the piece's lower-left anchor, so negative
// values are rejected; skirt indices would otherwise be undefined.
export const PieceOffsetsSchema = z
  .array(CellOffsetSchema)
  .min(1, 'A piece needs at least one cell')
  .superRefine((cells, ctx) => {
    const seen = new Set<string>();
    cells.forEach((cell, index) => {
      const key = `${cell.dx},${cell.dy}`;
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate cell ${key}`,
          path: [index],
        });
      }
      seen.add(key);
    });
  });

/**
 * Flatten zod issues into `{ path, message }` pairs for error context.
 */
export function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

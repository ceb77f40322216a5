/** Zod schemas for the config block, the position store file and saved-diagram files. */

import { z } from 'zod';

const ConfigValueSchema = z.union([z.string().max(500), z.number(), z.boolean()]);

export const DiagramConfigSchema = z.object({
  layout: z.string().transform((s) => s.toLowerCase()).pipe(z.enum(['fixed', 'auto'])).optional(),
  participant_spacing: z.number().positive().max(10_000).optional(),
}).catchall(ConfigValueSchema);

const Vec2Schema = z.tuple([z.number(), z.number()]);

export const NodeRecordSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number().positive(),
  height: z.number().positive(),
});

export const EdgeRecordSchema = z.object({
  use_bezier: z.boolean().optional(),
  start_offset: Vec2Schema.optional(),
  end_offset: Vec2Schema.optional(),
  control1: Vec2Schema.optional(),
  control2: Vec2Schema.optional(),
});

export type NodeRecord = z.infer<typeof NodeRecordSchema>;
export type EdgeRecord = z.infer<typeof EdgeRecordSchema>;

/** Outer shape only; records are validated one by one so a bad entry doesn't discard the rest. */
export const PositionFileSchema = z.object({
  nodes: z.record(z.string(), z.unknown()).nullish(),
  edges: z.record(z.string(), z.unknown()).nullish(),
});

/** Pre-wrapper files were a flat `{ nodeId: {x, y, width, height} }` map. */
export const LegacyPositionFileSchema = z.record(z.string(), z.unknown());

const HexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Expected a #rrggbb colour');

export const DiagramSettingsSchema = z.object({
  show_grid: z.boolean().optional(),
  antialiasing: z.boolean().optional(),
  node_color: HexColorSchema.optional(),
  border_color: HexColorSchema.optional(),
});

export const DiagramFileSchema = z.object({
  text: z.string().max(1_000_000),
  nodes: z.record(z.string(), z.unknown()).nullish(),
  edges: z.record(z.string(), z.unknown()).nullish(),
  settings: DiagramSettingsSchema.nullish(),
});

export type DiagramFileRecord = z.infer<typeof DiagramFileSchema>;

/** Flatten zod issues into `path: message` lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

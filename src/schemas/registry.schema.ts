import { z } from 'zod';

const CornerBoxSchema = z
  .tuple([z.number(), z.number(), z.number(), z.number()])
  .transform(([x1, y1, x2, y2]) => ({ left: x1, top: y1, width: x2 - x1, height: y2 - y1 }));

const SizedBoxSchema = z.object({
  left: z.number(),
  top: z.number(),
  width: z.number(),
  height: z.number(),
});

export const BoundingBoxSchema = z
  .union([CornerBoxSchema, SizedBoxSchema])
  .refine((box) => box.width >= 0 && box.height >= 0, {
    message: 'Bounding box must have non-negative width and height',
  });

export const RegistryNodeSchema = z.object({
  g_icon_name: z.string(),
  g_brief: z.string().default(''),
  bbox: BoundingBoxSchema,
});

export const RegistryStateSchema = z.object({
  image: z.string().optional(),
  nodes: z.record(RegistryNodeSchema),
});

export const RegistryDocumentSchema = z.object({
  states: z.record(RegistryStateSchema),
});

export type RegistryDocumentInput = z.input<typeof RegistryDocumentSchema>;
export type RegistryDocument = z.output<typeof RegistryDocumentSchema>;
export type RegistryNode = z.output<typeof RegistryNodeSchema>;

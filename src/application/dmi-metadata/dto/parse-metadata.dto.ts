import { z } from 'zod';

export const metadataSourceSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('text'),
    text: z.string().min(1),
  }),
  z.object({
    type: z.literal('container'),
    uri: z.string().min(1),
  }),
]);

export const parseMetadataCommandSchema = z.object({
  id: z.string().min(1),
  source: metadataSourceSchema,
});

export type MetadataSourcePayload = z.infer<typeof metadataSourceSchema>;

export type ParseMetadataPayload = z.infer<typeof parseMetadataCommandSchema>;

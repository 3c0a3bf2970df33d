import { z } from 'zod';

export const ToolDocumentSchema = z.record(z.unknown());

/** Opaque structured document exchanged with the tool server. */
export type ToolDocument = z.infer<typeof ToolDocumentSchema>;

const RawToolDescriptorSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  input_schema: ToolDocumentSchema.optional(),
  schema: ToolDocumentSchema.optional(),
});

export const ToolDescriptorSchema = RawToolDescriptorSchema.transform(raw => ({
  name: raw.name,
  description: raw.description ?? '',
  input_schema: raw.input_schema ?? raw.schema ?? {},
}));

export type ToolDescriptor = z.output<typeof ToolDescriptorSchema>;

export const GatewayOperationSchema = z.enum([
  'list_tools',
  'describe_tool',
  'invoke_tool',
]);

export type GatewayOperation = z.infer<typeof GatewayOperationSchema>;

export const GatewayRequestSchema = z
  .object({
    operation: GatewayOperationSchema,
    name: z.string().min(1).optional(),
    arguments: ToolDocumentSchema.default({}),
  })
  .refine(request => request.operation === 'list_tools' || request.name !== undefined, {
    message: 'Tool name is required for describe_tool and invoke_tool',
    path: ['name'],
  });

export type GatewayRequest = z.infer<typeof GatewayRequestSchema>;

export interface GatewayResponse {
  operation: GatewayOperation;
  data: ToolDocument;
}

/**
 * Parse the entries of a `tools` array, keeping only well-formed descriptors.
 */
export function parseToolDescriptors(raw: unknown): ToolDescriptor[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const tools: ToolDescriptor[] = [];
  for (const item of raw) {
    const parsed = ToolDescriptorSchema.safeParse(item);
    if (parsed.success) {
      tools.push(parsed.data);
    }
  }
  return tools;
}

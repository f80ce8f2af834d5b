/**
 * Schema adapter for MCP tool registration
 *
 * The SDK takes a raw Zod shape for `inputSchema` and builds the object
 * schema itself, so tool schemas are declared as objects and unwrapped here.
 */
import { type z } from 'zod';

/**
 * @param schema - Zod object schema (e.g., z.object({...}))
 * @returns The object's shape for `registerTool`
 */
export const toMcpSchema = <T extends z.ZodRawShape>(schema: z.ZodObject<T>): T => {
  return schema.shape;
};

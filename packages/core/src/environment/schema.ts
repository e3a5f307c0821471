import { z } from "zod";

export const PipBlockSchema = z.object({ pip: z.array(z.string()) }).strict();

export const RawEnvironmentSchema = z
  .object({
    // `name: 311` is a valid environment name; the file keeps its source form
    name: z.union([z.string(), z.number()]).transform(String).optional(),
    channels: z.array(z.string()).optional(),
    dependencies: z.array(z.unknown(), {
      invalid_type_error: "'dependencies' must be a list",
    }),
  })
  .passthrough();

export type RawEnvironment = z.infer<typeof RawEnvironmentSchema>;

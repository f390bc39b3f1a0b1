import { z } from "zod/v4";

export const REPRESENTATIONS = ["7-bit", "8-bit"] as const;

const optionsSchema = z.object({
  representation: z.enum(REPRESENTATIONS).default("7-bit"),
  visible: z.boolean().default(false),
});

/**
 * How C1 controls are written out. `7-bit` uses the ESC Fe form
 * (`ESC [` for CSI), `8-bit` the single bytes 0x80–0x9F.
 */
export type Representation = (typeof REPRESENTATIONS)[number];

export type Options = z.infer<typeof optionsSchema>;

export function resolveOptions(input: unknown = {}): Options {
  return optionsSchema.parse(input);
}

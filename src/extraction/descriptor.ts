import { z } from "zod";
import type { ContentDescriptor } from "./types.js";

export const contentDescriptorSchema = z
  .object({
    text: z.string().default(""),
    html: z.string().default(""),
    subject: z.string().default(""),
    from: z.string().default(""),
    url: z.string().url().optional(),
    password: z.string().min(1).optional(),
  })
  .refine((d) => d.text.trim() !== "" || d.html.trim() !== "" || d.url !== undefined, {
    message: "one of text, html or url is required",
  });

export type ContentDescriptorInput = z.input<typeof contentDescriptorSchema>;

/**
 * Read a descriptor back from its stored JSON form.
 */
export function parseStoredDescriptor(json: string): ContentDescriptor {
  return contentDescriptorSchema.parse(JSON.parse(json));
}

/**
 * Zod schemas for the parts of Graph responses graphpipe reads.
 * Unknown properties pass through untouched.
 */

import { z } from "zod";
import { GraphRequestError } from "./errors.js";

export const GraphErrorBodySchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

export const PageSchema = z.object({
  value: z.array(z.unknown()),
  "@odata.nextLink": z.string().optional(),
});

const EmailAddressSchema = z.object({
  emailAddress: z.object({
    address: z.string().optional(),
    name: z.string().optional(),
  }),
});

export const MessageSchema = z.object({
  id: z.string(),
  subject: z.string().nullish(),
  from: EmailAddressSchema.nullish(),
  receivedDateTime: z.string().nullish(),
  hasAttachments: z.boolean().nullish(),
  webLink: z.string().nullish(),
});

export const AttachmentSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  contentType: z.string().nullish(),
  size: z.number().nullish(),
});

export const DriveItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  size: z.number().nullish(),
  webUrl: z.string().nullish(),
  folder: z.object({}).passthrough().nullish(),
  parentReference: z
    .object({
      path: z.string().nullish(),
    })
    .nullish(),
});

export type Message = z.infer<typeof MessageSchema>;
export type Attachment = z.infer<typeof AttachmentSchema>;
export type DriveItem = z.infer<typeof DriveItemSchema>;

/**
 * Parse one Graph resource or fail with the resource kind in the message.
 */
export function parseResource<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, kind: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new GraphRequestError(`Unexpected ${kind} in Graph response: ${detail}`);
  }
  return result.data;
}

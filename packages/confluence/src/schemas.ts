import { z } from "zod";

// Only the fields the loader reads are declared; zod strips the rest.

export const currentUserSchema = z.object({
  type: z.string().optional(),
  accountId: z.string().optional(),
  username: z.string().optional(),
  displayName: z.string().optional(),
});

export const spaceSchema = z.object({
  key: z.string(),
  name: z.string(),
});

export const pageSchema = z.object({
  id: z.string(),
  title: z.string(),
  version: z
    .object({
      number: z.number(),
      when: z.string().optional(),
    })
    .optional(),
  body: z
    .object({
      storage: z.object({ value: z.string() }).optional(),
    })
    .optional(),
  _links: z
    .object({
      webui: z.string().optional(),
    })
    .optional(),
});

export const attachmentSchema = z.object({
  id: z.string(),
  title: z.string(),
  metadata: z
    .object({
      mediaType: z.string().optional(),
    })
    .optional(),
  extensions: z
    .object({
      mediaType: z.string().optional(),
      fileSize: z.number().optional(),
    })
    .optional(),
  _links: z.object({
    download: z.string(),
  }),
});

export function pagedSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    results: z.array(item),
    start: z.number().optional(),
    limit: z.number().optional(),
    size: z.number().optional(),
  });
}

export type ConfluenceUser = z.infer<typeof currentUserSchema>;
export type ConfluenceSpace = z.infer<typeof spaceSchema>;
export type ConfluencePage = z.infer<typeof pageSchema>;
export type ConfluenceAttachment = z.infer<typeof attachmentSchema>;

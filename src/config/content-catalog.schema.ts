import { z } from 'zod';

const Identifier = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'must be alphanumeric with - or _');

const ContentTypeEntrySchema = z.object({
  token: Identifier.refine((t) => !t.includes('_'), 'content type tokens cannot contain "_"'),
  formats: z.array(Identifier).min(1),
});

/**
 * Shape of `config/content-catalog.json` (or the file named by SITE_CONTENT_CATALOG_PATH).
 *
 * Key order of `formatExtensions` matters: when two formats share an extension,
 * the first one declared wins the reverse lookup.
 */
export const ContentCatalogSchema = z
  .object({
    formatExtensions: z.record(Identifier, z.string().regex(/^[A-Za-z0-9-]+$/, 'extension cannot contain "."')),
    milestones: z.array(Identifier),
    contentTypes: z.record(Identifier, ContentTypeEntrySchema),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Map<string, string>();
    for (const [name, entry] of Object.entries(catalog.contentTypes)) {
      const owner = seen.get(entry.token);
      if (owner !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['contentTypes', name, 'token'],
          message: `token '${entry.token}' already used by '${owner}'`,
        });
      }
      seen.set(entry.token, name);

      for (const format of entry.formats) {
        if (!(format in catalog.formatExtensions)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['contentTypes', name, 'formats'],
            message: `unknown format '${format}'`,
          });
        }
      }
    }
  });

export type ContentCatalogData = z.infer<typeof ContentCatalogSchema>;

import { isAbsolute } from "node:path";
import { z } from "zod";

export const serviceRegistryEntrySchema = z.object({
  id: z.string().regex(/^[a-z][a-z0-9-]*$/, "id must be a lowercase slug"),
  label: z.string().trim().min(1),
  module: z
    .string()
    .min(1)
    .refine((value) => !isAbsolute(value), "module must be relative to the project root"),
  export: z.string().regex(/^[A-Za-z_$][\w$]*$/, "export must be an identifier")
});

export const serviceRegistrySchema = z
  .array(serviceRegistryEntrySchema)
  .min(1, "service registry must declare at least one service")
  .superRefine((entries, ctx) => {
    const seenIds = new Set<string>(["entry"]);
    const seenLabels = new Set<string>();
    entries.forEach((entry, index) => {
      if (seenIds.has(entry.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, "id"], message: `duplicate or reserved id "${entry.id}"` });
      }
      if (seenLabels.has(entry.label)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, "label"], message: `duplicate label "${entry.label}"` });
      }
      seenIds.add(entry.id);
      seenLabels.add(entry.label);
    });
  });

export type ServiceRegistryEntry = z.infer<typeof serviceRegistryEntrySchema>;

import { z } from "zod";

export const CategorySchema = z.enum(["experts", "facilities", "organizations"]);

const PhaseSchema = z
  .object({
    id: z.string().min(1),
    number: z.number().int().positive(),
    name: z.string(),
    category: CategorySchema,
    stage: z.enum(["metadata", "details"]),
    list_url: z.string().url().nullable(),
    partitioned: z.boolean(),
    depends_on: z.string().nullable()
  })
  .refine((phase) => phase.stage === "details" || phase.list_url !== null, {
    message: "metadata phases need a list_url"
  });

export const PhaseRegistrySchema = z
  .object({
    version: z.string(),
    base_url: z.string().url(),
    login_url: z.string().url(),
    phases: z.array(PhaseSchema).min(1)
  })
  .superRefine((registry, ctx) => {
    const ids = new Set(registry.phases.map((phase) => phase.id));
    if (ids.size !== registry.phases.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "phase ids must be unique" });
    }
    for (const phase of registry.phases) {
      if (phase.depends_on !== null && !ids.has(phase.depends_on)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${phase.id} depends on unknown phase ${phase.depends_on}`
        });
      }
    }
  });

export type Category = z.infer<typeof CategorySchema>;
export type PhaseRegistry = z.infer<typeof PhaseRegistrySchema>;
export type PhaseConfig = z.infer<typeof PhaseSchema>;

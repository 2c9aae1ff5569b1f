import { z } from 'zod';

// Backends are free to add fields; only the ones the gateway reads are checked.
const record = z.record(z.unknown());

export const recordListSchema = z.array(record);

/** List bodies arrive either bare or wrapped in `items` / `data`. */
export const recordListPayloadSchema = z.union([
  recordListSchema,
  z.object({ items: recordListSchema }).transform(payload => payload.items),
  z.object({ data: recordListSchema }).transform(payload => payload.data),
]);

const hours = z.coerce.number().nonnegative().default(0);

export const activitySummarySchema = z.object({
  productive_hours: hours,
  idle_hours: hours,
  productivity_score: z.coerce.number().default(0),
  is_online: z.boolean().default(false),
});

export type ActivitySummaryPayload = z.infer<typeof activitySummarySchema>;

const looseId = z.union([z.string(), z.number()]).transform(String);

export const labPayloadSchema = z
  .object({
    id: looseId,
    name: z.string(),
    domain: z.string().optional(),
    focusArea: z.string().optional(),
    focus_area: z.string().optional(),
    description: z.string().nullish(),
    contactEmail: z.string().nullish(),
    contact_email: z.string().nullish(),
    organizationId: looseId.nullish(),
    organization_id: looseId.nullish(),
    orchestrator_org_id: looseId.nullish(),
  })
  .transform(lab => ({
    id: lab.id,
    name: lab.name,
    focusArea: lab.focusArea ?? lab.focus_area ?? lab.domain ?? '',
    description: lab.description ?? '',
    contactEmail: lab.contactEmail ?? lab.contact_email ?? null,
    organizationId: lab.organizationId ?? lab.organization_id ?? lab.orchestrator_org_id ?? null,
  }));

export const researcherPayloadSchema = z
  .object({
    id: looseId,
    name: z.string().default(''),
    labId: looseId.optional(),
    lab_id: looseId.optional(),
    expertise: z.array(z.string()).optional(),
    field: z.string().nullish(),
  })
  .transform((researcher, ctx) => {
    const labId = researcher.labId ?? researcher.lab_id;
    if (labId === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Researcher ${researcher.id} has no lab` });
      return z.NEVER;
    }
    const expertise = researcher.expertise ?? (researcher.field ? researcher.field.split(',') : []);
    return { id: researcher.id, name: researcher.name, labId, expertise };
  });

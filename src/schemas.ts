import { z } from 'zod';

// ─── Bundled content ────────────────────────────────────────────────────────

export const ManifestationSchema = z.object({
  id: z.number().int(),
  set: z.array(z.string()),
});

// cards without an id are keyed by their title
export const CardSchema = z
  .object({
    id: z.union([z.number(), z.string()]).optional(),
    title: z.string(),
    message: z.string().default(''),
    prompt: z.string().default(''),
  })
  .transform(card => ({
    id: card.id ?? card.title,
    title: card.title,
    message: card.message,
    prompt: card.prompt,
  }));

export const ReminderSchema = z.object({
  name: z.string().min(1),
  hour: z.number().int().min(0).max(23),
  minute: z.number().int().min(0).max(59),
  /** 0 = Sunday */
  days: z.array(z.number().int().min(0).max(6)).optional(),
  text: z.string(),
});

// ─── Rotation state ─────────────────────────────────────────────────────────

export const ItemIdSchema = z.union([z.number(), z.string()]);

export const UsedIdsSchema = z.array(ItemIdSchema);

export const TodayStateSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  id: ItemIdSchema,
});

/** First issue of a failed parse as `<path>: <message>`; the root is reported as `root`. */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'root: invalid';
  return `${issue.path.length ? issue.path.join('.') : 'root'}: ${issue.message}`;
}

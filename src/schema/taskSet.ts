import { z } from 'zod';

// ── Target ──────────────────────────────────────────────────

export interface Target {
  host: string;
  port?: number | undefined;
  username?: string | undefined;
  password?: string | undefined;
  keyPath?: string | undefined;
}

const targetFields = {
  host: z.string().min(1),
  port: z.number().int().positive().max(65_535).optional(),
  username: z.string().min(1).optional(),
  password: z.string().optional(),
  key_path: z.string().min(1).optional(),
};

type RawTarget = {
  host?: string | undefined;
  port?: number | undefined;
  username?: string | undefined;
  password?: string | undefined;
  key_path?: string | undefined;
};

// Only defined keys are copied so a shallow merge never erases a batch value.
function compactTarget(raw: RawTarget): Partial<Target> {
  const target: Partial<Target> = {};
  if (raw.host !== undefined) target.host = raw.host;
  if (raw.port !== undefined) target.port = raw.port;
  if (raw.username !== undefined) target.username = raw.username;
  if (raw.password !== undefined) target.password = raw.password;
  if (raw.key_path !== undefined) target.keyPath = raw.key_path;
  return target;
}

export const targetSchema = z
  .object(targetFields)
  .transform((raw): Target => ({ ...compactTarget(raw), host: raw.host }));

export const targetOverrideSchema = z
  .object(targetFields)
  .partial()
  .transform(compactTarget);

export function mergeTarget(base: Target, override: Partial<Target> | undefined): Target {
  if (!override) return base;
  return { ...base, ...override, host: override.host ?? base.host };
}

// ── Task ────────────────────────────────────────────────────

export const extractionModeSchema = z.enum(['oracle', 'scan']);

export type ExtractionMode = z.infer<typeof extractionModeSchema>;

const taskIdSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

export const taskSchema = z
  .object({
    id: taskIdSchema,
    name: z.string().min(1),
    goal: z.string().min(1),
    category: z.string().min(1).default('uncategorized'),
    requires: z.array(taskIdSchema).default([]),
    max_steps: z.number().int().positive().optional(),
    use_summarizer: z.boolean().optional(),
    extraction: extractionModeSchema.optional(),
    target: targetOverrideSchema.optional(),
  })
  .transform((raw) => ({
    id: raw.id,
    name: raw.name,
    goal: raw.goal,
    category: raw.category,
    requires: raw.requires,
    maxSteps: raw.max_steps,
    useSummarizer: raw.use_summarizer,
    extraction: raw.extraction,
    target: raw.target,
  }));

export type Task = z.infer<typeof taskSchema>;

// ── Global settings ─────────────────────────────────────────

export const globalSettingsSchema = z
  .object({
    max_steps: z.number().int().positive().optional(),
    use_summarizer: z.boolean().optional(),
    output_dir: z.string().min(1).optional(),
    extraction: extractionModeSchema.optional(),
  })
  .transform((raw) => ({
    maxSteps: raw.max_steps,
    useSummarizer: raw.use_summarizer,
    outputDir: raw.output_dir,
    extraction: raw.extraction,
  }));

export type GlobalSettings = z.infer<typeof globalSettingsSchema>;

// ── Full task set document ──────────────────────────────────

export const taskSetSchema = z
  .object({
    target: targetSchema,
    global_settings: globalSettingsSchema.optional(),
    tasks: z.array(taskSchema).min(1, 'tasks must be a non-empty list'),
  })
  .superRefine((doc, ctx) => {
    const seen = new Set<string>();
    doc.tasks.forEach((task, index) => {
      if (seen.has(task.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tasks', index, 'id'],
          message: `Duplicate task id "${task.id}"`,
        });
      }
      seen.add(task.id);
    });
  })
  .transform((doc) => ({
    target: doc.target,
    globalSettings: doc.global_settings ?? {
      maxSteps: undefined,
      useSummarizer: undefined,
      outputDir: undefined,
      extraction: undefined,
    },
    tasks: doc.tasks,
  }));

export type TaskSet = z.infer<typeof taskSetSchema>;

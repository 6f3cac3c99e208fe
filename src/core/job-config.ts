import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { parse } from 'yaml';
import { z } from 'zod';

import type { Axis } from './matrix.js';
import type { StepDefinition } from './job-runner.js';
import { normalizeTriggers } from './triggers.js';
import { ConfigError, JobFileNotFoundError, errorMessage } from '../utils/errors.js';
import { fileExists } from '../utils/fs.js';

export const DEFAULT_JOB_FILE = 'matrixrun.yml';

export interface JobConfig {
  name: string;
  /** Normalized event names that start this job. */
  triggers: string[];
  axes: Axis[];
  include: Record<string, string>[];
  exclude: Record<string, string>[];
  steps: StepDefinition[];
  env: Record<string, string>;
  concurrency?: number;
  timeoutMs?: number;
}

// Documents are read with the failsafe schema, so scalars arrive as
// strings ("3.10" stays "3.10"); numbers are accepted for object input.
const scalarSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);
const bindingSchema = z.record(z.string(), scalarSchema);
const axisValuesSchema = z.array(scalarSchema, {
  invalid_type_error: 'axis values must be a list',
});
const minutesSchema = z.coerce.number().positive('must be greater than zero');

const stepSchema = z
  .object({
    name: z.string().trim().min(1, 'step name is required'),
    run: z.string().refine((s) => s.trim().length > 0, 'command must not be empty'),
    env: bindingSchema.optional(),
    'timeout-minutes': minutesSchema.optional(),
  })
  .strict();

const jobSchema = z
  .object({
    name: z.string().optional(),
    on: z.union([z.string(), z.array(z.string()), z.record(z.string(), z.unknown())]).optional(),
    env: bindingSchema.optional(),
    matrix: z.record(z.string(), z.unknown()).optional(),
    steps: z.array(stepSchema).min(1, 'at least one step is required'),
    concurrency: z.coerce.number().int().positive().optional(),
    'timeout-minutes': minutesSchema.optional(),
  })
  .strict();

type RawJob = z.infer<typeof jobSchema>;

function formatIssues(error: z.ZodError, prefix: (string | number)[] = []): string[] {
  return error.issues.map((issue) => {
    const path = [...prefix, ...issue.path].join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function minutesToMs(minutes: number | undefined): number | undefined {
  return minutes === undefined ? undefined : Math.round(minutes * 60_000);
}

function parseMatrix(matrix: RawJob['matrix'], issues: string[]): Pick<JobConfig, 'axes' | 'include' | 'exclude'> {
  const axes: Axis[] = [];
  let include: Record<string, string>[] = [];
  let exclude: Record<string, string>[] = [];

  for (const [key, value] of Object.entries(matrix ?? {})) {
    if (key === 'include' || key === 'exclude') {
      const parsed = z.array(bindingSchema).safeParse(value);
      if (!parsed.success) {
        issues.push(...formatIssues(parsed.error, ['matrix', key]));
      } else if (key === 'include') {
        include = parsed.data;
      } else {
        exclude = parsed.data;
      }
      continue;
    }

    const parsed = axisValuesSchema.safeParse(value);
    if (!parsed.success) {
      issues.push(...formatIssues(parsed.error, ['matrix', key]));
    } else {
      axes.push({ name: key, values: parsed.data });
    }
  }

  return { axes, include, exclude };
}

/** Validates an already-parsed job document. `source` names it in errors. */
export function parseJobConfig(raw: unknown, source = 'job'): JobConfig {
  const parsed = jobSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid job definition in ${source}`, formatIssues(parsed.error));
  }

  const job = parsed.data;
  const issues: string[] = [];
  const matrix = parseMatrix(job.matrix, issues);
  if (issues.length > 0) {
    throw new ConfigError(`Invalid job definition in ${source}`, issues);
  }

  const config: JobConfig = {
    name: job.name?.trim() || 'job',
    triggers: normalizeTriggers(job.on),
    ...matrix,
    steps: job.steps.map((step) => {
      const def: StepDefinition = { name: step.name, run: step.run };
      if (step.env) def.env = step.env;
      const timeoutMs = minutesToMs(step['timeout-minutes']);
      if (timeoutMs !== undefined) def.timeoutMs = timeoutMs;
      return def;
    }),
    env: job.env ?? {},
  };
  if (job.concurrency !== undefined) config.concurrency = job.concurrency;
  const timeoutMs = minutesToMs(job['timeout-minutes']);
  if (timeoutMs !== undefined) config.timeoutMs = timeoutMs;

  return config;
}

export async function loadJobConfig(path: string = DEFAULT_JOB_FILE): Promise<JobConfig> {
  const fullPath = resolve(path);
  if (!(await fileExists(fullPath))) {
    throw new JobFileNotFoundError(fullPath);
  }

  let raw: unknown;
  try {
    const text = await readFile(fullPath, 'utf-8');
    raw = parse(text, { schema: 'failsafe' });
  } catch (error) {
    throw new ConfigError(`Could not parse ${path}: ${errorMessage(error)}`);
  }

  return parseJobConfig(raw, path);
}

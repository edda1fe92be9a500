import { z } from 'zod';

// ── Reusable primitives ──

const kebabCase = z
  .string()
  .min(1)
  .regex(/^[a-z0-9][a-z0-9-]*$/, 'must be kebab-case');

const httpMethod = z
  .string()
  .transform((m) => m.toUpperCase())
  .pipe(z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD']));

// ── Action schemas ──

const requestSchema = z.object({
  method: httpMethod.default('GET'),
  url: z.string().min(1),
  headers: z.record(z.string()).default({}),
  body: z.unknown().optional(),
  expect_status: z.array(z.number().int().min(100).max(599)).min(1).optional(),
});

const whenSchema = z.object({
  env: z.string().min(1),
  equals: z.string().optional(),
});

// ── Step schema (file format) ──

export const stepSchema = z.object({
  id: kebabCase,
  description: z.string().optional(),
  order: z.number().int().optional(),
  run: z.string().min(1).optional(),
  command: z.array(z.string()).min(1).optional(),
  request: requestSchema.optional(),
  cwd: z.string().optional(),
  env: z.record(z.string()).default({}),
  continue_on_error: z.boolean().default(false),
  timeout_sec: z.number().positive().optional(),
  when: whenSchema.optional(),
});

// ── Pipeline schema ──

export const pipelineSchema = z.object({
  name: kebabCase,
  description: z.string().optional(),
  cwd: z.string().optional(),
  timeout_sec: z.number().positive().optional(),
  env: z.record(z.string()).default({}),
  steps: z.array(stepSchema).min(1),
});

// ── Derived TypeScript types ──

export type StepSpec = z.infer<typeof stepSchema>;
export type Pipeline = z.infer<typeof pipelineSchema>;
export type RequestSpec = z.infer<typeof requestSchema>;
export type StepCondition = z.infer<typeof whenSchema>;

// ── Runtime step model ──

export type CommandAction =
  | { kind: 'command'; argv: string[] }
  | { kind: 'shell'; script: string };

export interface RequestAction {
  kind: 'request';
  method: RequestSpec['method'];
  url: string;
  headers: Record<string, string>;
  body?: unknown;
  expect_status?: number[];
}

export type StepAction = CommandAction | RequestAction;

/** One unit of deployment work. Immutable for the duration of a run. */
export interface Step {
  readonly id: string;
  readonly order: number;
  readonly action: StepAction;
  readonly continue_on_error: boolean;
  readonly timeout_sec?: number;
  readonly cwd?: string;
  readonly env: Readonly<Record<string, string>>;
  readonly when?: StepCondition;
  readonly description?: string;
}

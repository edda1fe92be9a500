import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { SequencerError, ConfigurationError, ErrorCode } from '../lib/errors.js';
import { pipelineSchema, type Pipeline, type Step, type StepAction, type StepSpec } from './types.js';

// ── Pre-validation (catch structural errors before Zod) ──

function preValidate(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return '✗ pipeline file must contain a YAML object\n  Example:\n    name: my-pipeline\n    steps:\n      - id: install\n        run: "npm ci"';
  }

  if ('steps' in raw && Array.isArray(raw.steps) && Array.isArray(raw.steps[0])) {
    return '✗ steps must be an array of objects, not nested arrays\n  Each step needs: id and one of run, command, request';
  }

  if ('name' in raw && typeof raw.name === 'number') {
    return '✗ pipeline.name must be a string, not a number\n  Example: name: "deploy-staging"';
  }

  return null;
}

// ── Error formatting ──

export function formatPipelineError(error: ZodError): string {
  const lines: string[] = [];

  for (const issue of error.issues) {
    const path = issue.path.join('.');

    if (path === 'steps' && issue.code === 'too_small') {
      lines.push('✗ pipeline.steps must have at least one step');
      lines.push('  Example:\n    steps:\n      - id: install\n        run: "npm ci"');
      continue;
    }

    if (path === 'name' && issue.code === 'invalid_string') {
      lines.push('✗ pipeline.name must be kebab-case');
      lines.push('  Example: deploy-staging, helpdesk-standalone');
      continue;
    }

    if (issue.code === 'custom') {
      // Business rule errors from superRefine
      lines.push(`✗ ${issue.message}`);
      continue;
    }

    lines.push(`✗ ${path}: ${issue.message}`);
  }

  return lines.join('\n');
}

// ── Business rule validation (superRefine) ──

const pipelineWithRules = pipelineSchema.superRefine((pipeline, ctx) => {
  // 1. Unique step IDs
  const seen = new Set<string>();
  for (const step of pipeline.steps) {
    if (seen.has(step.id)) {
      ctx.addIssue({ code: 'custom', message: `duplicate step id: "${step.id}"` });
    }
    seen.add(step.id);
  }

  // 2. Exactly one action per step
  for (const step of pipeline.steps) {
    const kinds = [step.run, step.command, step.request].filter((a) => a !== undefined);
    if (kinds.length === 0) {
      ctx.addIssue({
        code: 'custom',
        message: `step "${step.id}": needs one of run, command or request`,
      });
    } else if (kinds.length > 1) {
      ctx.addIssue({
        code: 'custom',
        message: `step "${step.id}": run, command and request are mutually exclusive`,
      });
    }
  }

  // 3. Ordering indices must be distinct
  const orders = new Map<number, string>();
  pipeline.steps.forEach((step, index) => {
    const order = step.order ?? index;
    const other = orders.get(order);
    if (other !== undefined) {
      ctx.addIssue({
        code: 'custom',
        message: `step "${step.id}": order ${order} is already used by "${other}"`,
      });
    }
    orders.set(order, step.id);
  });
});

// ── Step conversion ──

function toAction(spec: StepSpec): StepAction {
  if (spec.command) return { kind: 'command', argv: spec.command };
  if (spec.request) {
    return {
      kind: 'request',
      method: spec.request.method,
      url: spec.request.url,
      headers: spec.request.headers,
      body: spec.request.body,
      expect_status: spec.request.expect_status,
    };
  }
  if (spec.run) return { kind: 'shell', script: spec.run };
  throw new ConfigurationError(`step "${spec.id}" has no action`);
}

/** Build the immutable runtime steps of a validated pipeline */
export function toSteps(pipeline: Pipeline): Step[] {
  return pipeline.steps.map((spec, index) => ({
    id: spec.id,
    order: spec.order ?? index,
    action: toAction(spec),
    continue_on_error: spec.continue_on_error,
    timeout_sec: spec.timeout_sec,
    cwd: spec.cwd,
    env: spec.env,
    when: spec.when,
    description: spec.description,
  }));
}

// ── Public API ──

/** Parse a YAML string into a validated Pipeline. Throws SequencerError on failure. */
export function parsePipelineYaml(content: string): Pipeline {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new SequencerError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `Invalid YAML: ${err instanceof Error ? err.message : String(err)}`,
      'Check the pipeline file for syntax errors (indentation, colons, etc.)',
    );
  }

  const preError = preValidate(raw);
  if (preError) {
    throw new ConfigurationError(preError);
  }

  const result = pipelineWithRules.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      formatPipelineError(result.error),
      'Fix the issues above and try again',
    );
  }

  return result.data;
}

/** Load and parse a pipeline file. Throws SequencerError on failure. */
export function loadPipelineFile(filePath: string): Pipeline {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    throw new SequencerError(
      ErrorCode.CONFIG_NOT_FOUND,
      `pipeline file not found: ${filePath}`,
      'Run: stepseq run --config <path-to-pipeline.yaml>',
    );
  }

  return parsePipelineYaml(content);
}

/** Working directory for a pipeline: its `cwd` relative to the file, or the file's directory */
export function pipelineCwd(pipeline: Pipeline, filePath: string): string {
  const base = dirname(resolve(filePath));
  return pipeline.cwd ? resolve(base, pipeline.cwd) : base;
}

/** Step ids in execution order (ascending ordering index) */
export function executionOrder(steps: readonly Step[]): string[] {
  return [...steps].sort((a, b) => a.order - b.order).map((s) => s.id);
}

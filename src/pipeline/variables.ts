import type { StepAction } from './types.js';

// ── Variable expansion ──

const VARIABLE_PATTERN = /\$\{\{\s*(env|secrets)\.\s*([a-zA-Z_]\w*)\s*\}\}/g;

/**
 * Expand `${{ env.NAME }}` and `${{ secrets.NAME }}` markers from `env`.
 * Unresolved markers are left intact. Every value substituted for a
 * `secrets.*` marker is pushed onto `secrets` so callers can mask it.
 */
export function expandVariables(
  text: string,
  env: Readonly<Record<string, string | undefined>>,
  secrets?: string[],
): string {
  return text.replace(VARIABLE_PATTERN, (match, source: string, name: string) => {
    const value = env[name];
    if (value === undefined) return match;
    if (source === 'secrets' && secrets && !secrets.includes(value)) {
      secrets.push(value);
    }
    return value;
  });
}

function expandBody(
  body: unknown,
  env: Readonly<Record<string, string | undefined>>,
  secrets: string[],
): unknown {
  if (typeof body === 'string') return expandVariables(body, env, secrets);
  if (Array.isArray(body)) return body.map((item) => expandBody(item, env, secrets));
  if (typeof body === 'object' && body !== null) {
    return Object.fromEntries(
      Object.entries(body).map(([k, v]) => [k, expandBody(v, env, secrets)]),
    );
  }
  return body;
}

/** Expand every templated field of an action. Returns the secret values used. */
export function expandAction(
  action: StepAction,
  env: Readonly<Record<string, string | undefined>>,
): { action: StepAction; secrets: string[] } {
  const secrets: string[] = [];

  switch (action.kind) {
    case 'shell':
      return { action: { kind: 'shell', script: expandVariables(action.script, env, secrets) }, secrets };
    case 'command':
      return {
        action: { kind: 'command', argv: action.argv.map((arg) => expandVariables(arg, env, secrets)) },
        secrets,
      };
    case 'request': {
      const headers = Object.fromEntries(
        Object.entries(action.headers).map(([k, v]) => [k, expandVariables(v, env, secrets)]),
      );
      return {
        action: {
          ...action,
          url: expandVariables(action.url, env, secrets),
          headers,
          body: expandBody(action.body, env, secrets),
        },
        secrets,
      };
    }
  }
}

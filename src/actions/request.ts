import axios, { type AxiosInstance } from 'axios';
import type { RequestAction } from '../pipeline/types.js';
import { maskSecrets } from '../lib/utils/mask.js';
import { tail } from '../lib/utils/format.js';
import { debug } from '../lib/utils/debug.js';
import type { ActionContext, ActionOutcome } from './types.js';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/** Whether an HTTP status counts as success for this request */
export function isExpectedStatus(action: Pick<RequestAction, 'expect_status'>, status: number): boolean {
  if (action.expect_status) return action.expect_status.includes(status);
  return status >= 200 && status < 300;
}

function stringifyBody(data: unknown): string {
  if (data === undefined || data === null) return '';
  if (typeof data === 'string') return data;
  return JSON.stringify(data);
}

/**
 * Issue an HTTP request to a registry or CI system.
 * The response status plays the role of an exit code.
 */
export async function runRequestAction(
  action: RequestAction,
  ctx: ActionContext,
  client: AxiosInstance,
): Promise<ActionOutcome> {
  const label = maskSecrets(`${action.method} ${action.url}`, ctx.secrets);
  debug('actions:request', label);

  try {
    const response = await client.request<unknown>({
      method: action.method,
      url: action.url,
      headers: action.headers,
      data: action.body,
      timeout: ctx.timeoutSec !== undefined ? ctx.timeoutSec * 1000 : 0,
      signal: ctx.signal,
      validateStatus: () => true,
    });

    const output = tail(maskSecrets(stringifyBody(response.data), ctx.secrets));

    if (isExpectedStatus(action, response.status)) {
      return { ok: true, signal: { type: 'exit', code: response.status }, output };
    }

    return {
      ok: false,
      signal: {
        type: 'non_zero_exit',
        code: response.status,
        message: `${label} responded ${response.status}`,
      },
      output,
    };
  } catch (err) {
    if (axios.isCancel(err) || ctx.signal?.aborted) {
      return { ok: false, signal: { type: 'execution_error', message: 'aborted' }, output: '' };
    }

    if (axios.isAxiosError(err) && err.code !== undefined && TIMEOUT_CODES.has(err.code)) {
      return {
        ok: false,
        signal: {
          type: 'timeout',
          timeout_sec: ctx.timeoutSec ?? 0,
          message: `timed out after ${ctx.timeoutSec ?? 0}s`,
        },
        output: '',
      };
    }

    const reason = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      signal: {
        type: 'execution_error',
        message: maskSecrets(`${label} failed: ${reason}`, ctx.secrets),
      },
      output: '',
    };
  }
}

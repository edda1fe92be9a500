import axios, { type AxiosInstance } from 'axios';
import { expandAction } from '../pipeline/variables.js';
import { runCommandAction } from './command.js';
import { runRequestAction } from './request.js';
import type { ActionExecutor } from './types.js';

export interface ExecutorDeps {
  /** HTTP client for request steps */
  http?: AxiosInstance;
}

/**
 * Default executor: expands `${{ env.* }}` / `${{ secrets.* }}` markers from
 * the step environment, then dispatches on the action kind.
 */
export function createActionExecutor(deps: ExecutorDeps = {}): ActionExecutor {
  const http = deps.http ?? axios.create();

  return async (action, ctx) => {
    const expanded = expandAction(action, ctx.env);
    const actionCtx = { ...ctx, secrets: [...ctx.secrets, ...expanded.secrets] };

    switch (expanded.action.kind) {
      case 'command':
      case 'shell':
        return runCommandAction(expanded.action, actionCtx);
      case 'request':
        return runRequestAction(expanded.action, actionCtx, http);
    }
  };
}

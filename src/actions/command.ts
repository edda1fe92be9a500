import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { resolve } from 'node:path';
import type { CommandAction } from '../pipeline/types.js';
import { maskSecrets } from '../lib/utils/mask.js';
import { tail } from '../lib/utils/format.js';
import { debug } from '../lib/utils/debug.js';
import type { ActionContext, ActionOutcome } from './types.js';

/** Grace period between SIGTERM and SIGKILL on timeout/abort */
export const KILL_GRACE_MS = 2000;

const GROUP_KILL = process.platform !== 'win32';

function describeCommand(action: CommandAction): string {
  return action.kind === 'shell' ? action.script : action.argv.join(' ');
}

/**
 * Run an OS command (argument vector or shell line) to completion.
 * Exit 0 is success; anything else is reported through the outcome signal.
 */
export function runCommandAction(
  action: CommandAction,
  ctx: ActionContext,
): Promise<ActionOutcome> {
  const label = describeCommand(action);
  const chunks: string[] = [];
  const output = (): string => tail(maskSecrets(chunks.join(''), ctx.secrets));

  if (ctx.signal?.aborted) {
    return Promise.resolve({
      ok: false,
      signal: { type: 'execution_error', message: 'aborted before start' },
      output: '',
    });
  }

  if (action.kind === 'command' && action.argv.length === 0) {
    return Promise.resolve({
      ok: false,
      signal: { type: 'execution_error', message: 'empty command' },
      output: '',
    });
  }

  return new Promise((resolvePromise) => {
    let settled = false;
    let timedOut = false;
    let aborted = false;
    let timer: ReturnType<typeof setTimeout> | null = null;
    let killTimer: ReturnType<typeof setTimeout> | null = null;
    let child: ChildProcess;

    const finish = (outcome: ActionOutcome): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      // A pending SIGKILL still reaches descendants that ignored SIGTERM
      if (killTimer && !timedOut && !aborted) clearTimeout(killTimer);
      ctx.signal?.removeEventListener('abort', onAbort);
      resolvePromise(outcome);
    };

    // Children run in their own process group so shell grandchildren die with them
    const signalTree = (sig: NodeJS.Signals): void => {
      if (child.pid !== undefined && GROUP_KILL) {
        try {
          process.kill(-child.pid, sig);
          return;
        } catch (err) {
          debug('actions:command', `group ${sig} failed: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
      child.kill(sig);
    };

    const terminate = (): void => {
      signalTree('SIGTERM');
      killTimer = setTimeout(() => signalTree('SIGKILL'), KILL_GRACE_MS);
      killTimer.unref();
    };

    function onAbort(): void {
      aborted = true;
      terminate();
    }

    const cwd = resolve(ctx.cwd);
    const options: SpawnOptions = {
      cwd,
      env: ctx.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: GROUP_KILL,
    };

    debug('actions:command', `spawn ${maskSecrets(label, ctx.secrets)} (cwd: ${cwd})`);

    try {
      if (action.kind === 'shell') {
        child = spawn(action.script, { ...options, shell: true });
      } else {
        const [file = '', ...args] = action.argv;
        child = spawn(file, args, options);
      }
    } catch (err) {
      finish({
        ok: false,
        signal: {
          type: 'execution_error',
          message: maskSecrets(
            `failed to start "${label}": ${err instanceof Error ? err.message : String(err)}`,
            ctx.secrets,
          ),
        },
        output: '',
      });
      return;
    }

    child.stdout?.on('data', (data: Buffer) => chunks.push(data.toString()));
    child.stderr?.on('data', (data: Buffer) => chunks.push(data.toString()));

    child.on('error', (error) => {
      finish({
        ok: false,
        signal: {
          type: 'execution_error',
          message: maskSecrets(`failed to start "${label}": ${error.message}`, ctx.secrets),
        },
        output: output(),
      });
    });

    // A stopped step must not wait on pipes still held by orphaned descendants
    child.on('exit', () => {
      if (!timedOut && !aborted) return;
      child.stdout?.destroy();
      child.stderr?.destroy();
    });

    child.on('close', (code, signal) => {
      // Spawn failures are reported by the 'error' handler
      if (child.pid === undefined) return;

      if (timedOut) {
        finish({
          ok: false,
          signal: {
            type: 'timeout',
            timeout_sec: ctx.timeoutSec ?? 0,
            message: `timed out after ${ctx.timeoutSec ?? 0}s`,
          },
          output: output(),
        });
        return;
      }

      if (aborted) {
        finish({
          ok: false,
          signal: { type: 'execution_error', message: 'aborted' },
          output: output(),
        });
        return;
      }

      if (code === 0) {
        finish({ ok: true, signal: { type: 'exit', code: 0 }, output: output() });
        return;
      }

      finish({
        ok: false,
        signal: {
          type: 'non_zero_exit',
          code,
          message: code === null ? `terminated by ${signal ?? 'signal'}` : `exited with code ${code}`,
        },
        output: output(),
      });
    });

    ctx.signal?.addEventListener('abort', onAbort, { once: true });

    if (ctx.timeoutSec !== undefined) {
      timer = setTimeout(() => {
        timedOut = true;
        debug('actions:command', `timeout after ${ctx.timeoutSec}s: ${maskSecrets(label, ctx.secrets)}`);
        terminate();
      }, ctx.timeoutSec * 1000);
    }
  });
}

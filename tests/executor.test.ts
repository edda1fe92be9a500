import { describe, it, expect } from 'vitest';
import axios, { type InternalAxiosRequestConfig } from 'axios';
import { testContext } from './helpers/test-context.js';
import { createActionExecutor } from '../src/actions/executor.js';

const ctx = testContext();

describe('createActionExecutor', () => {
  it('expands variables before running a command', async () => {
    const execute = createActionExecutor();
    const outcome = await execute(
      { kind: 'command', argv: ['${{ env.NODE_BIN }}', '-e', "process.stdout.write('${{ env.WORD }}')"] },
      { cwd: ctx.createTempDir(), env: { NODE_BIN: process.execPath, WORD: 'ready' }, secrets: [] },
    );
    expect(outcome).toEqual({ ok: true, signal: { type: 'exit', code: 0 }, output: 'ready' });
  });

  it('dispatches requests to the injected client and masks substituted secrets', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
      adapter: async (config) => {
        seen.push(config);
        return { data: `echo ${String(config.headers.get('X-Token'))}`, status: 200, statusText: 'OK', headers: {}, config };
      },
    });
    const execute = createActionExecutor({ http });

    const outcome = await execute(
      {
        kind: 'request',
        method: 'PUT',
        url: 'https://${{ env.HOST }}/deploy',
        headers: { 'X-Token': '${{ secrets.TOKEN }}' },
      },
      { cwd: '.', env: { HOST: 'ci.test', TOKEN: 'test-secret' }, secrets: [] },
    );

    expect(seen[0]!.url).toBe('https://ci.test/deploy');
    expect(outcome).toEqual({ ok: true, signal: { type: 'exit', code: 200 }, output: 'echo ***' });
  });
});

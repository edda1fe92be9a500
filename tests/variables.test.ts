import { describe, it, expect } from 'vitest';
import { expandVariables, expandAction } from '../src/pipeline/variables.js';

describe('expandVariables', () => {
  it('expands env variables', () => {
    expect(expandVariables('docker push ${{ env.IMAGE }}:latest', { IMAGE: 'app' })).toBe(
      'docker push app:latest',
    );
  });

  it('leaves unresolved variables intact', () => {
    expect(expandVariables('tag ${{ env.MISSING }}', {})).toBe('tag ${{ env.MISSING }}');
  });

  it('resolves secrets from the environment and collects their values', () => {
    const secrets: string[] = [];
    const result = expandVariables('login -p ${{ secrets.PASS }}', { PASS: 'test-secret' }, secrets);
    expect(result).toBe('login -p test-secret');
    expect(secrets).toEqual(['test-secret']);
  });

  it('does not collect env values as secrets', () => {
    const secrets: string[] = [];
    expandVariables('${{ env.PASS }}', { PASS: 'visible' }, secrets);
    expect(secrets).toEqual([]);
  });

  it('handles multiple variables and loose spacing', () => {
    expect(expandVariables('${{env.A}} and ${{  env.B  }}', { A: 'hello', B: 'world' })).toBe(
      'hello and world',
    );
  });
});

describe('expandAction', () => {
  const env = { IMAGE: 'app', TOKEN: 'test-token' };

  it('expands shell scripts', () => {
    expect(expandAction({ kind: 'shell', script: 'docker build -t ${{ env.IMAGE }} .' }, env)).toEqual({
      action: { kind: 'shell', script: 'docker build -t app .' },
      secrets: [],
    });
  });

  it('expands each argument of a command', () => {
    const { action } = expandAction({ kind: 'command', argv: ['docker', 'push', '${{ env.IMAGE }}:latest'] }, env);
    expect(action).toEqual({ kind: 'command', argv: ['docker', 'push', 'app:latest'] });
  });

  it('expands url, headers and nested body strings of a request', () => {
    const { action, secrets } = expandAction(
      {
        kind: 'request',
        method: 'POST',
        url: 'https://registry.test/${{ env.IMAGE }}',
        headers: { Authorization: 'Bearer ${{ secrets.TOKEN }}' },
        body: { image: '${{ env.IMAGE }}', tags: ['latest', '${{ env.IMAGE }}-1'], replicas: 2 },
      },
      env,
    );
    expect(action).toEqual({
      kind: 'request',
      method: 'POST',
      url: 'https://registry.test/app',
      headers: { Authorization: 'Bearer test-token' },
      body: { image: 'app', tags: ['latest', 'app-1'], replicas: 2 },
    });
    expect(secrets).toEqual(['test-token']);
  });
});

import { z } from 'zod';
import { categorizeError, success, error, registerTool } from '../../../src/tools/helpers.js';
import { ToolRegistry } from '../../../src/tools/registry.js';
import type { PluginContext } from '../../../src/tools/context.js';
import { DEFAULT_CONFIG } from '../../../src/config/loader.js';

function contextWithSudo(useSudo: boolean): Pick<PluginContext, 'config'> {
  const config = structuredClone(DEFAULT_CONFIG);
  config.privilege.use_sudo = useSudo;
  return { config };
}

describe('categorizeError', () => {
  it.each([
    ['error: target not found: zfs-linux-zen', 'PACKAGE_NOT_FOUND', 'not_found'],
    ['error: failed to init transaction (unable to lock database)', 'RESOURCE_LOCKED', 'lock'],
    [':: unresolvable package conflicts detected', 'DEPENDENCY_CONFLICT', 'dependency'],
    ['error: failed retrieving file zfs-dkms.pkg.tar.zst', 'NETWORK_ERROR', 'network'],
    ['error: you cannot perform this operation unless you are root.', 'PERMISSION_DENIED', 'privilege'],
    ['something else entirely', 'COMMAND_FAILED', 'state'],
  ])('classifies %p', (message, code, category) => {
    const result = categorizeError(message, contextWithSudo(true));
    expect(result.code).toBe(code);
    expect(result.category).toBe(category);
  });

  it('tailors privilege remediation to the sudo setting', () => {
    expect(categorizeError('sudo: a password is required', contextWithSudo(false)).remediation)
      .toEqual(['Run the server as root, or set privilege.use_sudo: true in config.yaml']);
  });
});

describe('response builders', () => {
  it('builds success and error envelopes', () => {
    expect(success('kmod_scan', 'test-host', 12, null, { ok: true }, { total: 1 })).toEqual({
      status: 'success', tool: 'kmod_scan', target_host: 'test-host', duration_ms: 12, command_executed: null,
      data: { ok: true }, total: 1,
    });
    expect(error('kmod_scan', 'test-host', 0, { code: 'COMMAND_FAILED', category: 'state', message: 'failed' })).toEqual({
      status: 'error', tool: 'kmod_scan', target_host: 'test-host', duration_ms: 0, command_executed: null,
      error_code: 'COMMAND_FAILED', error_category: 'state', message: 'failed', transient: false, remediation: [],
    });
  });
});

describe('registerTool', () => {
  function registerEcho(registry: ToolRegistry) {
    registerTool({ registry }, {
      name: 'kmod_echo', description: 'echo', module: 'compat', riskLevel: 'read-only', duration: 'instant',
      inputSchema: z.object({ kernel: z.string().min(1), mode: z.enum(['precompiled', 'dkms']).optional() }),
    }, async (args, execCtx) => success('kmod_echo', execCtx.targetHost, 0, null, { kernel: args.kernel, mode: args.mode ?? null }));
  }

  it('hands parsed arguments of a keyed schema to the handler', async () => {
    const registry = new ToolRegistry();
    registerEcho(registry);
    const response = await registry.execute('kmod_echo', { kernel: 'linux-lts', mode: 'dkms' }, { targetHost: 'test-host' });
    expect(response).toEqual({
      status: 'success', tool: 'kmod_echo', target_host: 'test-host', duration_ms: 0, command_executed: null,
      data: { kernel: 'linux-lts', mode: 'dkms' },
    });
  });

  it('rejects arguments the schema refuses', async () => {
    const registry = new ToolRegistry();
    registerEcho(registry);
    const response = await registry.execute('kmod_echo', {}, { targetHost: 'test-host' });
    expect(response).toEqual({
      status: 'error', tool: 'kmod_echo', target_host: 'test-host', duration_ms: 0, command_executed: null,
      error_code: 'INVALID_INPUT', error_category: 'validation', message: 'kernel: Required',
      transient: false, remediation: [],
    });
  });
});

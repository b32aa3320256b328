/**
 * Gateway runtime wiring test
 *
 * Builds the full runtime over in-memory SQLite with an in-process backend.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseConfig, queryAuditLogs } from '@toolgate/core';
import { createGatewayRuntime, type GatewayRuntime } from '../src/runtime.js';
import { FakeBackendClient, makeTool } from './helpers.js';

describe('createGatewayRuntime', () => {
  let tempDir: string;
  let runtime: GatewayRuntime;
  let docsClients: FakeBackendClient[];

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'toolgate-runtime-'));
    docsClients = [];

    const config = parseConfig({
      database: { url: ':memory:' },
      vault: { master_key: 'ab'.repeat(32), data_dir: tempDir },
      audit: { spill_path: path.join(tempDir, 'audit-spill.jsonl') },
    });

    runtime = createGatewayRuntime(config, {
      env: {},
      backends: {
        docs: () => {
          const client = new FakeBackendClient('docs', {
            tools: [makeTool('search', 'Search pages')],
            handler: async (_tool, params) => ({ success: true, data: { hits: [params['q']] }, error: null }),
          });
          docsClients.push(client);
          return client;
        },
      },
    });
  });

  afterEach(async () => {
    await runtime.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should register the sql backend and any extra kinds', () => {
    expect(runtime.registry.kinds()).toEqual(['sql', 'docs']);
  });

  it('should not write a key file when a master key is configured', () => {
    expect(fs.existsSync(path.join(tempDir, 'credential_master_key'))).toBe(false);
  });

  it('should serve tools, enforce policy and audit every call end to end', async () => {
    const connection = await runtime.connections.createConnection({
      ownerId: 'user-1',
      kind: 'docs',
      name: 'Wiki',
      credentials: { token: 'test-secret' },
    });

    const tools = await runtime.pool.listTools('user-1');
    expect(tools.map(tool => tool.name)).toEqual(['docs.search']);
    expect(tools[0]?.description).toBe('[Wiki] Search pages');

    const allowed = await runtime.pool.callTool('user-1', 'docs.search', { q: 'onboarding' });
    expect(allowed).toMatchObject({ success: true, data: { hits: ['onboarding'] } });

    await runtime.permissions.setPermission({
      user_id: 'user-1',
      connection_id: connection.connection_id,
      tool_name: 'search',
      permission_kind: 'blocked',
    });

    const denied = await runtime.pool.callTool('user-1', 'docs.search', { q: 'salaries' });
    expect(denied.error).toBe("Tool 'search' is blocked");

    const page = await queryAuditLogs(runtime.db, { user_id: 'user-1' });
    expect(page.logs.map(log => log.status).sort()).toEqual(['denied', 'success']);
  });

  it('should rebuild the user gateway when a connection changes', async () => {
    const connection = await runtime.connections.createConnection({ ownerId: 'user-1', kind: 'docs', name: 'Wiki' });
    await runtime.pool.getOrBuild('user-1');
    expect(docsClients).toHaveLength(1);

    await runtime.connections.updateConnection('user-1', connection.connection_id, { enabled: false });

    expect(docsClients[0]?.disconnectCalls).toBe(1);
    expect(runtime.pool.has('user-1')).toBe(false);
    expect(await runtime.pool.listTools('user-1')).toEqual([]);
  });
});

// Mock DependencyInjectionService before importing
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { AccessCommand } from './access-command';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { createMemoryLedgerHost } from '@medialedger/core/memory';
import type { Host } from '@medialedger/core';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

type JsonOutput = { success: boolean; data?: unknown; error?: string; exitCode?: number };

function lastJsonOutput(): JsonOutput {
  const outputs = mockConsoleLog.mock.calls
    .map((call) => call[0])
    .filter((arg): arg is string => typeof arg === 'string' && arg.includes('"success"'));
  const last = outputs[outputs.length - 1];
  if (last === undefined) {
    throw new Error('No JSON output captured');
  }
  return JSON.parse(last);
}

describe('AccessCommand', () => {
  let accessCommand: AccessCommand;
  let host: Host.LedgerHost;

  beforeEach(async () => {
    jest.clearAllMocks();

    host = createMemoryLedgerHost().host;
    await host.as('human:alice').archiveNewMedia({
      name: 'clip.mp4',
      byteCount: 2048,
      summary: 'Opening shot',
      labels: ['video'],
    });

    const mockDependencyService = {
      getLedgerHost: jest.fn().mockResolvedValue(host),
      resolveCaller: jest.fn(async (override?: string) => override ?? 'human:alice'),
      setVerbose: jest.fn().mockResolvedValue(undefined),
    };

    (DependencyInjectionService.getInstance as jest.MockedFunction<typeof DependencyInjectionService.getInstance>)
      .mockReturnValue(mockDependencyService as never);

    accessCommand = new AccessCommand();
  });

  it('[EARS-1] WHEN the owner grants access THE SYSTEM SHALL record the grant', async () => {
    await accessCommand.executeGrant('1', 'agent:uploader', { json: true });

    expect(lastJsonOutput()).toEqual({
      success: true,
      data: { recordId: 1, principal: 'agent:uploader', canAccess: true },
    });
    expect(await host.checkAccess(1, 'agent:uploader')).toBe(true);
  });

  it('[EARS-1b] WHEN a non-owner grants access THE SYSTEM SHALL report an ownership violation', async () => {
    await accessCommand.executeGrant('1', 'human:bob', { as: 'human:bob' });

    expect(mockConsoleError).toHaveBeenCalledWith(
      '❌ Failed to grant access: [OWNERSHIP_VIOLATION] human:bob is not the owner of media record 1'
    );
    expect(mockProcessExit).toHaveBeenCalledWith(2);
    expect(await host.checkAccess(1, 'human:bob')).toBe(false);
  });

  it('[EARS-2] WHEN the owner revokes access THE SYSTEM SHALL remove the grant', async () => {
    await host.as('human:alice').grantAccess(1, 'agent:uploader');

    await accessCommand.executeRevoke('1', 'agent:uploader', {});

    expect(mockConsoleLog).toHaveBeenCalledWith('✅ Access revoked: agent:uploader on media record 1');
    expect(await host.checkAccess(1, 'agent:uploader')).toBe(false);
  });

  it('[EARS-2b] WHEN the record does not exist THE SYSTEM SHALL report a missing record', async () => {
    await accessCommand.executeRevoke('9', 'agent:uploader', { json: true });

    expect(lastJsonOutput().error).toBe('Failed to revoke access: [MISSING_RECORD] Media record 9 not found');
  });

  it('[EARS-3] WHEN access is checked THE SYSTEM SHALL report the creator grant', async () => {
    await accessCommand.executeCheck('1', 'human:alice', { json: true });

    expect(lastJsonOutput()).toEqual({
      success: true,
      data: { recordId: 1, principal: 'human:alice', canAccess: true },
    });
  });

  it('[EARS-3b] WHEN no grant exists THE SYSTEM SHALL report no access without failing', async () => {
    await accessCommand.executeCheck('1', 'human:bob', {});

    expect(mockConsoleLog).toHaveBeenCalledWith('✅ human:bob has no access to media record 1');
    expect(mockProcessExit).not.toHaveBeenCalled();
  });

  it('[EARS-3c] WHEN the record id is malformed THE SYSTEM SHALL fail', async () => {
    await accessCommand.executeCheck('0', 'human:alice', {});

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Invalid record id: "0"');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });
});

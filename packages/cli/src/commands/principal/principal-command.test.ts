// Mock DependencyInjectionService before importing
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { PrincipalCommand } from './principal-command';
import { DependencyInjectionService } from '../../services/dependency-injection';
import { Session } from '@medialedger/core';
import { MemorySessionStore } from '@medialedger/core/memory';

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

describe('PrincipalCommand', () => {
  const switchedAt = '2026-01-01T00:00:00.000Z';
  let principalCommand: PrincipalCommand;
  let sessionStore: MemorySessionStore;

  beforeEach(() => {
    jest.clearAllMocks();

    sessionStore = new MemorySessionStore();
    const sessionManager = new Session.SessionManager(sessionStore, () => new Date(switchedAt));
    const mockDependencyService = {
      getSessionManager: jest.fn().mockResolvedValue(sessionManager),
    };

    (DependencyInjectionService.getInstance as jest.MockedFunction<typeof DependencyInjectionService.getInstance>)
      .mockReturnValue(mockDependencyService as never);

    principalCommand = new PrincipalCommand();
  });

  it('[EARS-1] WHEN principal use is executed THE SYSTEM SHALL store the active principal', async () => {
    await principalCommand.executeUse('human:alice', { json: true });

    expect(lastJsonOutput()).toEqual({ success: true, data: { activePrincipal: 'human:alice' } });
    expect(sessionStore.getSession()).toEqual({
      activePrincipal: 'human:alice',
      lastSession: { principal: 'human:alice', timestamp: switchedAt },
    });
  });

  it('[EARS-1b] WHEN the principal is malformed THE SYSTEM SHALL fail without touching the session', async () => {
    await principalCommand.executeUse('Alice', {});

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Failed to set active principal: Invalid principal: "Alice"');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
    expect(sessionStore.getSession()).toBeNull();
  });

  it('[EARS-2] WHEN principal show is executed THE SYSTEM SHALL print the active principal', async () => {
    await principalCommand.executeUse('human:alice', { quiet: true });

    await principalCommand.executeShow({});

    expect(mockConsoleLog).toHaveBeenCalledWith(`✅ Active principal: human:alice\n   Since: ${switchedAt}`);
  });

  it('[EARS-2b] WHEN no principal is active THE SYSTEM SHALL fail', async () => {
    await principalCommand.executeShow({ json: true });

    expect(lastJsonOutput()).toEqual({
      success: false,
      error: "No active principal. Run 'medialedger principal use <principal>'.",
      exitCode: 1,
    });
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('[EARS-3] WHEN principal clear is executed THE SYSTEM SHALL keep only the last switch', async () => {
    await principalCommand.executeUse('human:alice', { quiet: true });

    await principalCommand.executeClear({ json: true });

    expect(lastJsonOutput()).toEqual({ success: true, data: { activePrincipal: null } });
    expect(sessionStore.getSession()).toEqual({
      lastSession: { principal: 'human:alice', timestamp: switchedAt },
    });
  });
});

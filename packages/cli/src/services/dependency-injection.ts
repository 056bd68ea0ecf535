import * as path from 'path';
import { Logger } from '@medialedger/core';
import type { Config, EventBus, Host, Records, Session } from '@medialedger/core';
import {
  createConfigManager,
  createFsLedgerHost,
  createSessionManager,
  findLedgerRoot,
} from '@medialedger/core/fs';
import { attachActivityLog } from './activity-log';

/**
 * Dependency Injection Service for the MediaLedger CLI
 *
 * Locates the ledger from the working directory and wires the core modules
 * against it. Instances are created lazily and cached for the process.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private ledgerRoot: string | null = null;
  private configManager: Config.ConfigManager | null = null;
  private sessionManager: Session.ISessionManager | null = null;
  private ledgerHost: Host.LedgerHost | null = null;
  private eventBus: EventBus.IEventStream | null = null;
  private logger: Logger.Logger | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Drops the cached instance (tests)
   */
  static resetInstance(): void {
    DependencyInjectionService.instance = null;
  }

  /**
   * Nearest directory at or above the working directory that holds .medialedger
   */
  getLedgerRoot(): string {
    if (this.ledgerRoot) {
      return this.ledgerRoot;
    }
    const root = findLedgerRoot(process.cwd());
    if (!root) {
      throw new Error("Ledger not initialized. Run 'medialedger init' first.");
    }
    this.ledgerRoot = root;
    return root;
  }

  /**
   * ConfigManager for a directory that may not hold a ledger yet (init)
   */
  getConfigManagerAt(directory: string): Config.ConfigManager {
    return createConfigManager(path.resolve(directory));
  }

  async getConfigManager(): Promise<Config.ConfigManager> {
    if (!this.configManager) {
      this.configManager = createConfigManager(this.getLedgerRoot());
    }
    return this.configManager;
  }

  async getSessionManager(): Promise<Session.ISessionManager> {
    if (!this.sessionManager) {
      this.sessionManager = createSessionManager(this.getLedgerRoot());
    }
    return this.sessionManager;
  }

  /**
   * Logger at the level from config.json, falling back to LOG_LEVEL
   */
  async getLogger(): Promise<Logger.Logger> {
    if (!this.logger) {
      const configManager = await this.getConfigManager();
      const level = await configManager.getLogLevel();
      this.logger = Logger.createLogger('[medialedger] ', level ?? undefined);
    }
    return this.logger;
  }

  async setVerbose(): Promise<void> {
    const logger = await this.getLogger();
    logger.setLevel('debug');
  }

  /**
   * fs-backed host; committed operations are reported on the logger at debug level
   */
  async getLedgerHost(): Promise<Host.LedgerHost> {
    if (!this.ledgerHost) {
      const logger = await this.getLogger();
      const { host, eventBus } = createFsLedgerHost(this.getLedgerRoot(), { logger });
      attachActivityLog(eventBus, logger);
      this.eventBus = eventBus;
      this.ledgerHost = host;
    }
    return this.ledgerHost;
  }

  /**
   * Waits for event handlers started by this process's ledger calls.
   * Nothing to wait for when no host was opened.
   */
  async drainEvents(): Promise<void> {
    if (this.eventBus) {
      await this.eventBus.waitForIdle();
    }
  }

  /**
   * The explicit override, else the session's active principal
   */
  async resolveCaller(override?: string): Promise<Records.Principal> {
    if (override) {
      return override;
    }
    const sessionManager = await this.getSessionManager();
    const principal = await sessionManager.getActivePrincipal();
    if (!principal) {
      throw new Error("No active principal. Run 'medialedger principal use <principal>' or pass --as <principal>.");
    }
    return principal;
  }
}

import { Command } from 'commander';
import type { Records } from '@medialedger/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions, CallerCommandOptions } from '../../interfaces/command';

export interface MediaFieldOptions extends CallerCommandOptions {
  name: string;
  size: number;
  summary: string;
  label: string[];
}

export interface MediaNewOptions extends MediaFieldOptions {}

export interface MediaUpdateOptions extends MediaFieldOptions {}

export interface MediaShowOptions extends BaseCommandOptions {}

export interface MediaTransferOptions extends CallerCommandOptions {}

export interface MediaRemoveOptions extends CallerCommandOptions {}

function toMetadata(options: MediaFieldOptions): Records.MediaMetadata {
  return {
    name: options.name,
    byteCount: options.size,
    summary: options.summary,
    labels: options.label,
  };
}

function formatRecord(record: Records.MediaRecord): string {
  return [
    `Media record ${record.recordId}: ${record.name}`,
    `   Owner: ${record.owner}`,
    `   Size: ${record.byteCount} bytes`,
    `   Created at height: ${record.createdAt}`,
    `   Summary: ${record.summary}`,
    `   Labels: ${record.labels.join(', ')}`,
  ].join('\n');
}

export class MediaCommand extends BaseCommand<CallerCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerMediaCommands() in media.ts
  }

  // [EARS-1] Archives a new record owned by the caller
  async executeNew(options: MediaNewOptions): Promise<void> {
    try {
      const caller = await this.callerFor(options);
      const result = await caller.archiveNewMedia(toMetadata(options));
      if (!result.ok) {
        this.handleCallError('create media record', result.error, options);
        return;
      }

      this.handleSuccess(
        { recordId: result.value, owner: caller.principal },
        options,
        `Media record created: ${result.value}\n   Owner: ${caller.principal}`
      );
    } catch (error) {
      this.handleError(
        `Failed to create media record: ${this.describeError(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  // [EARS-2] Reads a record without authorization
  async executeShow(rawRecordId: string, options: MediaShowOptions): Promise<void> {
    const recordId = this.parseRecordId(rawRecordId, options);
    if (recordId === null) return;

    try {
      const host = await this.dependencyService.getLedgerHost();
      const record = await host.getMediaRecord(recordId);
      if (!record) {
        this.handleError(`Media record ${recordId} not found`, options);
        return;
      }

      this.handleSuccess(record, options, formatRecord(record));
    } catch (error) {
      this.handleError(
        `Failed to read media record: ${this.describeError(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  // [EARS-3] Replaces name, size, summary and labels of an owned record
  async executeUpdate(rawRecordId: string, options: MediaUpdateOptions): Promise<void> {
    const recordId = this.parseRecordId(rawRecordId, options);
    if (recordId === null) return;

    try {
      const caller = await this.callerFor(options);
      const result = await caller.modifyMediaMetadata(recordId, toMetadata(options));
      if (!result.ok) {
        this.handleCallError('update media record', result.error, options);
        return;
      }

      this.handleSuccess({ recordId, updated: result.value }, options, `Media record updated: ${recordId}`);
    } catch (error) {
      this.handleError(
        `Failed to update media record: ${this.describeError(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  // [EARS-4] Hands an owned record to another principal
  async executeTransfer(rawRecordId: string, newOwner: string, options: MediaTransferOptions): Promise<void> {
    const recordId = this.parseRecordId(rawRecordId, options);
    if (recordId === null) return;

    try {
      const caller = await this.callerFor(options);
      const result = await caller.transferMediaOwnership(recordId, newOwner);
      if (!result.ok) {
        this.handleCallError('transfer media record', result.error, options);
        return;
      }

      this.handleSuccess(
        { recordId, previousOwner: caller.principal, newOwner },
        options,
        `Media record ${recordId} transferred: ${caller.principal} → ${newOwner}`
      );
    } catch (error) {
      this.handleError(
        `Failed to transfer media record: ${this.describeError(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  // [EARS-5] Deletes an owned record and its grants
  async executeRemove(rawRecordId: string, options: MediaRemoveOptions): Promise<void> {
    const recordId = this.parseRecordId(rawRecordId, options);
    if (recordId === null) return;

    try {
      const caller = await this.callerFor(options);
      const result = await caller.removeMediaRecord(recordId);
      if (!result.ok) {
        this.handleCallError('remove media record', result.error, options);
        return;
      }

      this.handleSuccess({ recordId, removed: result.value }, options, `Media record removed: ${recordId}`);
    } catch (error) {
      this.handleError(
        `Failed to remove media record: ${this.describeError(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}

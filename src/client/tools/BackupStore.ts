/**
 * Backup / Undo Store
 *
 * Holds the content a file had right before its most recent mutation, one record per path.
 * Undo consumes the record, so a second undo without a new edit has nothing to restore.
 */

import { ToolError, toIOFailure } from "../../shared/errors";
import { getLog } from "../../shared/logger";
import { createHash } from "node:crypto";
import { mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";

const logger = getLog(import.meta);

export interface BackupRecord {
	readonly path: string;
	/** Bytes before the mutation, or null when the file did not exist */
	readonly content: Buffer | null;
	readonly timestamp: number;
}

export interface BackupStoreOptions {
	/** Directory that mirrors snapshots on disk; omit to keep them in memory only */
	readonly backupDir?: string;
	readonly now?: () => number;
}

function sanitizeSnapshotKey(filePath: string): string {
	return filePath.replace(/[^A-Za-z0-9_-]/g, "_");
}

export class BackupStore {
	private readonly records = new Map<string, BackupRecord>();
	private readonly backupDir: string | undefined;
	private readonly now: () => number;

	constructor(options: BackupStoreOptions = {}) {
		this.backupDir = options.backupDir;
		this.now = options.now ?? Date.now;
	}

	get size(): number {
		return this.records.size;
	}

	has(filePath: string): boolean {
		return this.records.has(filePath);
	}

	/**
	 * Location of the on-disk mirror for a path, when a backup directory is configured.
	 * The hash keeps paths that sanitize to the same name apart.
	 */
	getBackupPath(filePath: string): string | undefined {
		if (!this.backupDir) {
			return;
		}
		const digest = createHash("sha256").update(filePath).digest("hex").slice(0, 8);
		return path.join(this.backupDir, `${sanitizeSnapshotKey(filePath)}-${digest}.bak`);
	}

	/**
	 * Records the pre-mutation content of a path, replacing any earlier record.
	 *
	 * @returns the record that was replaced, so a failed write can put it back with `restore`
	 */
	async snapshot(filePath: string, content: Buffer | null): Promise<BackupRecord | undefined> {
		const previous = this.records.get(filePath);
		const record: BackupRecord = { path: filePath, content, timestamp: this.now() };
		await this.writeMirror(record);
		this.records.set(filePath, record);
		logger.debug("Snapshot of %s (%s)", filePath, content === null ? "new file" : `${content.length} bytes`);
		return previous;
	}

	/**
	 * Returns the current record without consuming it.
	 */
	peek(filePath: string): BackupRecord | undefined {
		return this.records.get(filePath);
	}

	/**
	 * Puts back the record `snapshot` replaced, or drops the record when there was none.
	 */
	async restore(filePath: string, record: BackupRecord | undefined): Promise<void> {
		if (record) {
			await this.writeMirror(record);
			this.records.set(filePath, record);
			return;
		}
		this.records.delete(filePath);
		await this.removeMirror(filePath);
	}

	/**
	 * Writes the recorded content back to disk (or removes the file when it did not exist
	 * before) and discards the record.
	 *
	 * @returns the restored content, or null when the file was removed
	 * @throws ToolError `NoBackupAvailable` when the path has no record
	 */
	async undo(filePath: string): Promise<Buffer | null> {
		const record = this.records.get(filePath);
		if (!record) {
			throw new ToolError("NoBackupAvailable", `No backup available for ${filePath}`);
		}

		try {
			if (record.content === null) {
				await rm(filePath, { force: true });
			} else {
				await mkdir(path.dirname(filePath), { recursive: true });
				await writeFile(filePath, record.content);
			}
		} catch (error) {
			throw toIOFailure(error, `Failed to restore ${filePath}`);
		}

		this.records.delete(filePath);
		await this.removeMirror(filePath);
		logger.info("Restored %s from backup taken at %s", filePath, new Date(record.timestamp).toISOString());
		return record.content;
	}

	private async writeMirror(record: BackupRecord): Promise<void> {
		const backupPath = this.getBackupPath(record.path);
		if (!backupPath) {
			return;
		}
		try {
			if (record.content === null) {
				await rm(backupPath, { force: true });
				return;
			}
			await mkdir(path.dirname(backupPath), { recursive: true });
			await writeFile(backupPath, record.content);
		} catch (error) {
			throw toIOFailure(error, `Failed to write backup for ${record.path}`);
		}
	}

	private async removeMirror(filePath: string): Promise<void> {
		const backupPath = this.getBackupPath(filePath);
		if (!backupPath) {
			return;
		}
		try {
			await rm(backupPath, { force: true });
		} catch (error) {
			// The record is already gone; a stale mirror file is harmless
			logger.warn({ err: error }, "Failed to remove backup file %s", backupPath);
		}
	}
}

import * as fs from "node:fs";
import * as path from "node:path";
import type { BlobStore } from "./types.js";

function isCrossDevice(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "EXDEV";
}

/**
 * BlobStore on the local file system.
 */
export class FileBlobStore implements BlobStore {
	async exists(filePath: string): Promise<boolean> {
		try {
			await fs.promises.access(filePath, fs.constants.R_OK);
			return true;
		} catch {
			return false;
		}
	}

	async move(fromPath: string, toPath: string): Promise<void> {
		await fs.promises.mkdir(path.dirname(toPath), { recursive: true });
		try {
			await fs.promises.rename(fromPath, toPath);
		} catch (error) {
			// Temporary directory on another volume: rename cannot cross devices.
			if (!isCrossDevice(error)) {
				throw error;
			}
			await fs.promises.copyFile(fromPath, toPath);
			await fs.promises.rm(fromPath, { force: true });
		}
	}

	async remove(filePath: string): Promise<void> {
		await fs.promises.rm(filePath, { force: true });
	}

	async removeDirectory(dirPath: string): Promise<void> {
		await fs.promises.rm(dirPath, { recursive: true, force: true });
	}
}

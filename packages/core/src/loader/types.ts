/**
 * Collaborator contracts of the caching loader.
 */

/**
 * Download progress: bytes received so far and the expected total, if known.
 */
export type DownloadProgress = (bytesReceived: number, totalBytes: number | undefined) => void;

/**
 * Downloads a remote blob to a temporary file and resolves with its path.
 */
export type Downloader = (url: string, options: { onProgress?: DownloadProgress }) => Promise<string>;

/**
 * Turns a local file into its in-memory form.
 * Resolving with undefined marks the file as corrupt.
 */
export type PrepareObject<T> = (filePath: string) => Promise<T | undefined>;

/**
 * Directory-backed file operations used by the loader.
 */
export interface BlobStore {
	exists(filePath: string): Promise<boolean>;
	/** Move a file into place, creating the target directory. */
	move(fromPath: string, toPath: string): Promise<void>;
	/** Delete a file; missing files are not an error. */
	remove(filePath: string): Promise<void>;
	/** Delete a directory tree; missing directories are not an error. */
	removeDirectory(dirPath: string): Promise<void>;
}

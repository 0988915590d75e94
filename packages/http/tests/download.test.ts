import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Response } from "undici";
import { DownloadError, NetworkError } from "@muxcache/core";
import { downloadFile } from "../src/download.js";
import { proxyFetch } from "../src/proxy/index.js";

vi.mock("../src/proxy/index.js", () => ({
	proxyFetch: vi.fn(),
}));

vi.mock("node:fs", async (importOriginal) => {
	const actual = await importOriginal<typeof import("node:fs")>();
	return { ...actual, createWriteStream: vi.fn(actual.createWriteStream) };
});

describe("downloadFile", () => {
	let downloadDir: string;

	beforeEach(async () => {
		vi.mocked(proxyFetch).mockReset();
		downloadDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "muxcache-download-"));
	});

	afterEach(async () => {
		await fs.promises.rm(downloadDir, { recursive: true, force: true });
	});

	it("writes the body to a temporary file with the URL's extension", async () => {
		vi.mocked(proxyFetch).mockResolvedValueOnce(
			new Response("hello world", { status: 200, headers: { "content-length": "11" } }),
		);
		const onProgress = vi.fn();

		const filePath = await downloadFile("https://cdn.example.com/files/greeting.txt?v=2", { downloadDir, onProgress });

		expect(path.dirname(filePath)).toBe(downloadDir);
		expect(path.extname(filePath)).toBe(".txt");
		expect(await fs.promises.readFile(filePath, "utf-8")).toBe("hello world");
		expect(onProgress).toHaveBeenLastCalledWith(11, 11);
	});

	it("reports an unknown total without content-length", async () => {
		vi.mocked(proxyFetch).mockResolvedValueOnce(new Response("abc", { status: 200 }));
		const onProgress = vi.fn();

		await downloadFile("https://cdn.example.com/blob", { downloadDir, onProgress });

		expect(onProgress).toHaveBeenLastCalledWith(3, undefined);
	});

	it("fails on HTTP errors without leaving a file", async () => {
		vi.mocked(proxyFetch).mockResolvedValueOnce(new Response("missing", { status: 404 }));

		const error = await downloadFile("https://cdn.example.com/missing.png", { downloadDir }).catch(
			(reason: unknown) => reason,
		);

		expect(error).toBeInstanceOf(NetworkError);
		expect(error).toMatchObject({ statusCode: 404 });
		expect(await fs.promises.readdir(downloadDir)).toEqual([]);
	});

	it("sends the user agent and custom headers", async () => {
		vi.mocked(proxyFetch).mockResolvedValueOnce(new Response("x", { status: 200 }));

		await downloadFile("https://cdn.example.com/x.bin", { downloadDir, headers: { Authorization: "Bearer test-token" } });

		expect(vi.mocked(proxyFetch)).toHaveBeenCalledWith(
			"https://cdn.example.com/x.bin",
			expect.objectContaining({ headers: { "User-Agent": "muxcache", Authorization: "Bearer test-token" } }),
		);
	});

	it("rejects when the file cannot be written", async () => {
		const actual = await vi.importActual<typeof import("node:fs")>("node:fs");
		vi.mocked(fs.createWriteStream).mockImplementationOnce(() =>
			actual.createWriteStream(path.join(downloadDir, "vanished", "partial.bin")),
		);
		vi.mocked(proxyFetch).mockResolvedValueOnce(new Response("payload", { status: 200 }));

		const error = await downloadFile("https://cdn.example.com/payload.bin", { downloadDir }).catch(
			(reason: unknown) => reason,
		);

		expect(error).toBeInstanceOf(DownloadError);
		expect(await fs.promises.readdir(downloadDir)).toEqual([]);
	});
});

/**
 * zstd for HTTP bodies.
 *
 * With `enable_http_compression=1` ClickHouse compresses responses in any
 * encoding listed in Accept-Encoding, and it accepts request bodies sent with
 * `Content-Encoding: zstd`. fetch inflates gzip and br itself but passes zstd
 * through untouched, so that one is handled here.
 */

export type Compression = "zstd" | "none";

export const ZSTD_LEVEL = 3;

// Lazy-loaded codec functions - initialized by init()
let zstdCompressFn: ((source: Uint8Array, level: number) => Uint8Array) | undefined;
let zstdDecompressFn: ((source: Uint8Array) => Uint8Array) | undefined;

let initPromise: Promise<void> | undefined;

async function initZstd(): Promise<void> {
  const wasm = await import("@bokuweb/zstd-wasm");
  await wasm.init();
  zstdCompressFn = wasm.compress;
  zstdDecompressFn = wasm.decompress;
}

/** Load the zstd codec. Safe to call repeatedly; the module loads once. */
export function init(): Promise<void> {
  initPromise ??= initZstd();
  return initPromise;
}

export async function compressZstd(data: Uint8Array, level: number = ZSTD_LEVEL): Promise<Uint8Array> {
  await init();
  if (!zstdCompressFn) throw new Error("zstd codec failed to initialize");
  return zstdCompressFn(data, level);
}

export async function decompressZstd(data: Uint8Array): Promise<Uint8Array> {
  await init();
  if (!zstdDecompressFn) throw new Error("zstd codec failed to initialize");
  try {
    return zstdDecompressFn(data);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`zstd decompression failed: ${message}`);
  }
}

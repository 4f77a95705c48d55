const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  "text/html": ".html",
  "application/xhtml+xml": ".html",
  "application/pdf": ".pdf",
  "application/json": ".json",
  "text/plain": ".txt",
  "text/csv": ".csv",
  "text/xml": ".xml",
  "application/xml": ".xml",
  "image/png": ".png",
  "image/jpeg": ".jpg",
  "image/gif": ".gif",
  "application/zip": ".zip",
  "application/gzip": ".gz"
};

interface MagicSignature {
  bytes: number[];
  extension: string;
}

const MAGIC_SIGNATURES: MagicSignature[] = [
  { bytes: [0x25, 0x50, 0x44, 0x46, 0x2d], extension: ".pdf" },
  { bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], extension: ".png" },
  { bytes: [0xff, 0xd8, 0xff], extension: ".jpg" },
  { bytes: [0x47, 0x49, 0x46, 0x38], extension: ".gif" },
  { bytes: [0x50, 0x4b, 0x03, 0x04], extension: ".zip" },
  { bytes: [0x1f, 0x8b], extension: ".gz" }
];

const HASH_PREFIX_LENGTH = 12;

function extensionForContentType(contentType: string | null | undefined): string | null {
  if (!contentType) return null;
  const mime = contentType.split(";")[0].trim().toLowerCase();
  return CONTENT_TYPE_EXTENSIONS[mime] ?? null;
}

function startsWithBytes(content: Uint8Array, bytes: number[]): boolean {
  if (content.length < bytes.length) return false;
  return bytes.every((byte, index) => content[index] === byte);
}

function decodeUtf8(content: Uint8Array): string | null {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(content);
  } catch {
    return null;
  }
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

function sniffTextExtension(text: string): string {
  const head = text.trimStart().slice(0, 64).toLowerCase();
  if (head.startsWith("<!doctype html") || head.startsWith("<html")) return ".html";
  if (head.startsWith("<?xml")) return ".xml";
  if ((head.startsWith("{") || head.startsWith("[")) && isJson(text)) return ".json";
  return ".txt";
}

export function sniffExtension(content: Uint8Array): string {
  const signature = MAGIC_SIGNATURES.find((entry) => startsWithBytes(content, entry.bytes));
  if (signature) return signature.extension;

  const text = decodeUtf8(content);
  if (text === null || /[\u0000-\u0008\u000b\u000c\u000e-\u001f]/.test(text)) {
    return ".bin";
  }
  return sniffTextExtension(text);
}

/**
 * Name for a file registered without one: `file-<hash prefix><ext>`, with the
 * extension taken from the content type when it is known and sniffed from the
 * bytes otherwise.
 */
export function fallbackFilename(
  content: Uint8Array,
  contentHash: string,
  contentType?: string | null
): string {
  const extension = extensionForContentType(contentType) ?? sniffExtension(content);
  return `file-${contentHash.slice(0, HASH_PREFIX_LENGTH)}${extension}`;
}

export function storageName(filename: string): string {
  const base = filename.split(/[\\/]/).pop() ?? "";
  const cleaned = base.replace(/[\u0000-\u001f<>:"|?*]/g, "_").trim();
  if (!cleaned || cleaned === "." || cleaned === "..") return "file";
  return cleaned;
}

import { createHash } from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { Message, TokenUsage } from "./core/types";

export interface LlmLogEntry {
  timestamp: string;
  taskType: string;
  pageId?: string;
  promptName: string;
  modelId: string;
  cacheHit: boolean;
  durationMs: number;
  usage?: TokenUsage;
  error?: string;
  system?: string;
  messages: LlmLogMessage[];
}

export type LlmLogMessage = {
  role: string;
  content: (LlmLogTextPart | LlmLogImagePlaceholder)[];
};

type LlmLogTextPart = { type: "text"; text: string };

export type LlmLogImagePlaceholder = {
  type: "image";
  hash: string;
  byteLength: number;
  width: number;
  height: number;
};

/**
 * Replace base64 image data with a placeholder recording its hash, size
 * and PNG dimensions.
 */
export function sanitizeMessages(messages: Message[]): LlmLogMessage[] {
  return messages.map((m) => {
    if (typeof m.content === "string") {
      return { role: m.role, content: [{ type: "text" as const, text: m.content }] };
    }
    return {
      role: m.role,
      content: m.content.map((part) =>
        part.type === "text"
          ? { type: "text" as const, text: part.text }
          : {
              type: "image" as const,
              hash: hashBase64(part.image),
              byteLength: Math.round((part.image.length * 3) / 4),
              ...pngDimensions(part.image),
            }
      ),
    };
  });
}

export function hashBase64(base64: string): string {
  return createHash("sha256").update(base64).digest("hex").slice(0, 16);
}

/** PNG IHDR width/height from the first 24 decoded bytes. */
function pngDimensions(base64: string): { width: number; height: number } {
  const buf = Buffer.from(base64.slice(0, 32), "base64");
  if (buf.length < 24) return { width: 0, height: 0 };
  return { width: buf.readUInt32BE(16), height: buf.readUInt32BE(20) };
}

const MAX_LOG_ENTRIES = 250;

/**
 * JSONL writer keeping at most `maxEntries` lines (oldest are dropped).
 */
export function createLlmLogWriter(
  filePath: string,
  maxEntries = MAX_LOG_ENTRIES
): (entry: LlmLogEntry) => void {
  return (entry) => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

    const lines = fs.readFileSync(filePath, "utf-8").split("\n").filter(Boolean);
    if (lines.length > maxEntries) {
      fs.writeFileSync(filePath, lines.slice(lines.length - maxEntries).join("\n") + "\n");
    }
  };
}

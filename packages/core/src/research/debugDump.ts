import { promises as fs } from "node:fs";
import path from "node:path";
import { errorMessage } from "./errors.js";

export interface DebugRecorder {
  dump(name: string, value: unknown): Promise<void>;
  captureError(error: unknown, context: string): Promise<void>;
}

export const noopRecorder: DebugRecorder = {
  dump: async () => {},
  captureError: async () => {},
};

function safeName(name: string) {
  return name.replace(/[^a-zA-Z0-9_-]+/g, "_");
}

/**
 * Writes stage outputs and captured exceptions under `dir`. Write failures
 * are handed to `onWriteError`; a run never fails because a dump did.
 */
export function createDebugRecorder(args: {
  dir: string;
  now?: () => number;
  onWriteError?: (message: string) => void;
}): DebugRecorder {
  const now = args.now ?? Date.now;
  let seq = 0;

  // Same-millisecond writes would otherwise overwrite each other.
  const fileName = (stem: string, ext: string) => {
    seq += 1;
    return `${safeName(stem)}_${now()}_${seq}.${ext}`;
  };

  const write = async (file: string, body: string) => {
    try {
      await fs.mkdir(args.dir, { recursive: true });
      await fs.writeFile(path.join(args.dir, file), body, "utf8");
    } catch (e) {
      args.onWriteError?.(`debug dump ${file} failed: ${errorMessage(e)}`);
    }
  };

  return {
    dump: (name, value) => write(fileName(name, "json"), `${JSON.stringify(value, null, 2)}\n`),
    captureError: (error, context) => {
      const lines = [
        `Context: ${context}`,
        "",
        `Exception type: ${error instanceof Error ? error.name : typeof error}`,
        `Exception message: ${errorMessage(error)}`,
        "",
        "Stack:",
        error instanceof Error ? (error.stack ?? "(none)") : "(none)",
      ];
      return write(fileName("exception", "txt"), `${lines.join("\n")}\n`);
    },
  };
}

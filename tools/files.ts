/**
 * File capabilities confined to a workspace directory. Any path resolving
 * outside the workspace is rejected.
 */

import { Type } from "@sinclair/typebox";
import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, relative, resolve } from "node:path";
import type { Capability } from "../core/registry.js";

export interface FileToolOptions {
  workspaceDir: string;
  /** Default read limit in characters */
  maxLength?: number;
}

const DEFAULT_MAX_LENGTH = 10000;

/**
 * Resolve `path` against the workspace.
 * @throws Error if it escapes the workspace
 */
export function resolveInWorkspace(workspaceDir: string, path: string): string {
  const root = resolve(workspaceDir);
  const target = resolve(root, path);
  const rel = relative(root, target);
  if (rel.startsWith("..") || isAbsolute(rel)) {
    throw new Error(`Path '${path}' is outside the workspace`);
  }
  return target;
}

/**
 * Translate a simple glob (`*`, `?`) into an anchored regular expression.
 */
export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*").replace(/\?/g, ".");
  return new RegExp(`^${escaped}$`);
}

export function createFileCapabilities(options: FileToolOptions) {
  const maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;

  const ReadFileParams = Type.Object({
    filepath: Type.String({ minLength: 1, description: "Path to the file, relative to the workspace" }),
    max_length: Type.Integer({ minimum: 1, default: maxLength, description: "Maximum characters to read" }),
  });
  const WriteFileParams = Type.Object({
    filepath: Type.String({ minLength: 1, description: "Path to the file, relative to the workspace" }),
    content: Type.String({ description: "Content to write" }),
  });
  const ListFilesParams = Type.Object({
    directory: Type.String({ default: ".", description: "Directory, relative to the workspace" }),
    pattern: Type.String({ default: "*", description: "Glob pattern (*.md, *.txt, ...)" }),
  });

  const readFileCapability: Capability<typeof ReadFileParams> = {
    name: "read_file",
    description: "Read content from a file in the workspace.",
    parameters: ReadFileParams,
    returns: "content, length, whether it was truncated, and the file path",
    category: "files",
    execute: async ({ filepath, max_length }) => {
      const target = resolveInWorkspace(options.workspaceDir, filepath);
      const text = await readFile(target, "utf8");
      const content = text.slice(0, max_length);
      return { content, length: content.length, truncated: text.length > max_length, file: filepath };
    },
  };

  const writeFileCapability: Capability<typeof WriteFileParams> = {
    name: "write_file",
    description: "Write content to a file in the workspace. Creates directories if needed.",
    parameters: WriteFileParams,
    returns: "status, bytes written and the file path",
    category: "files",
    execute: async ({ filepath, content }) => {
      const target = resolveInWorkspace(options.workspaceDir, filepath);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, "utf8");
      return { status: "written", bytes: Buffer.byteLength(content, "utf8"), file: filepath };
    },
  };

  const listFilesCapability: Capability<typeof ListFilesParams> = {
    name: "list_files",
    description: "List files in a workspace directory with optional pattern matching.",
    parameters: ListFilesParams,
    returns: "files (sorted names), count and the directory",
    category: "files",
    execute: async ({ directory, pattern }) => {
      const target = resolveInWorkspace(options.workspaceDir, directory);
      const info = await stat(target);
      if (!info.isDirectory()) {
        throw new Error(`Not a directory: ${directory}`);
      }
      const matcher = globToRegExp(pattern);
      const entries = await readdir(target, { withFileTypes: true });
      const files = entries
        .filter((entry) => entry.isFile() && matcher.test(entry.name))
        .map((entry) => entry.name)
        .sort();
      return { files, count: files.length, directory };
    },
  };

  return { readFile: readFileCapability, writeFile: writeFileCapability, listFiles: listFilesCapability };
}

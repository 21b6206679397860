/**
 * System capabilities - what the host itself offers plugins through the
 * registry, under the `System` namespace:
 *
 *   read_file(path)                 → string | null
 *   write_file(path, content)       → boolean
 *   append_file(path, content)      → boolean
 *   edit_file(path, search, replace)→ boolean   (replaces every occurrence)
 *   run_tool_command(cmd, timeoutMs?) → { success, stdout, stderr }
 *
 * File paths are resolved against the install root and refused when they
 * land outside it. None of these throw; failures are logged (tagged with the
 * calling plugin's scope) and reported through the return value.
 */

import { readFile, writeFile, appendFile, mkdir } from 'fs/promises';
import { dirname, isAbsolute, resolve } from 'path';
import { exec } from 'child_process';
import { z } from 'zod';
import { isContainedPath } from './loader.js';
import type { Capability, CapabilityRegistry } from './registry.js';
import type { Logger } from '../logging/logger.js';

export const SYSTEM_NAMESPACE = 'System';

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
}

export interface SystemCapabilityOptions {
  /** Root every file path must stay inside; also the shell's working directory */
  installRoot: string;
  /** Default timeout for run_tool_command */
  shellTimeoutMs: number;
  logger: Logger;
}

const PathArgs = z.object({ path: z.string().min(1) });
const WriteArgs = PathArgs.extend({ content: z.string() });
const EditArgs = PathArgs.extend({ search: z.string().min(1), replace: z.string() });
const CommandArgs = z.object({
  command: z.string().min(1),
  timeoutMs: z.number().int().positive().optional(),
});

export function createSystemCapabilities(options: SystemCapabilityOptions): Record<string, Capability> {
  const root = resolve(options.installRoot);
  const { logger } = options;

  /** Absolute path inside the root, or undefined (logged) when refused. */
  const confine = (path: string, action: string): string | undefined => {
    const target = isAbsolute(path) ? resolve(path) : resolve(root, path);
    if (!isContainedPath(root, target)) {
      logger.warn(`${action} refused: "${path}" is outside the install root`);
      return undefined;
    }
    return target;
  };

  const readConfined = async (target: string, path: string): Promise<string | null> => {
    try {
      return await readFile(target, 'utf8');
    } catch (err) {
      logger.error(`read_file failed for ${path}`, err);
      return null;
    }
  };

  const readText: Capability = async (...args) => {
    const parsed = PathArgs.safeParse({ path: args[0] });
    if (!parsed.success) {
      logger.warn(`read_file: ${parsed.error.issues[0]?.message ?? 'invalid arguments'}`);
      return null;
    }
    const target = confine(parsed.data.path, 'read_file');
    return target ? readConfined(target, parsed.data.path) : null;
  };

  const writeText = (mode: 'write' | 'append'): Capability => async (...args) => {
    const action = `${mode}_file`;
    const parsed = WriteArgs.safeParse({ path: args[0], content: args[1] });
    if (!parsed.success) {
      logger.warn(`${action}: ${parsed.error.issues[0]?.message ?? 'invalid arguments'}`);
      return false;
    }
    const target = confine(parsed.data.path, action);
    if (!target) return false;

    try {
      await mkdir(dirname(target), { recursive: true });
      if (mode === 'write') {
        await writeFile(target, parsed.data.content, 'utf8');
      } else {
        await appendFile(target, parsed.data.content, 'utf8');
      }
      return true;
    } catch (err) {
      logger.error(`${action} failed for ${parsed.data.path}`, err);
      return false;
    }
  };

  const editText: Capability = async (...args) => {
    const parsed = EditArgs.safeParse({ path: args[0], search: args[1], replace: args[2] });
    if (!parsed.success) {
      logger.warn(`edit_file: ${parsed.error.issues[0]?.message ?? 'invalid arguments'}`);
      return false;
    }
    const target = confine(parsed.data.path, 'edit_file');
    if (!target) return false;

    const current = await readConfined(target, parsed.data.path);
    if (current === null) return false;

    try {
      await writeFile(target, current.split(parsed.data.search).join(parsed.data.replace), 'utf8');
      return true;
    } catch (err) {
      logger.error(`edit_file failed for ${parsed.data.path}`, err);
      return false;
    }
  };

  const runCommand: Capability = (...args) => {
    const parsed = CommandArgs.safeParse({ command: args[0], timeoutMs: args[1] });
    if (!parsed.success) {
      const result: CommandResult = {
        success: false,
        stdout: '',
        stderr: parsed.error.issues[0]?.message ?? 'invalid arguments',
      };
      return Promise.resolve(result);
    }
    const timeoutMs = parsed.data.timeoutMs ?? options.shellTimeoutMs;
    return executeCommand(parsed.data.command, { cwd: root, timeoutMs });
  };

  return {
    read_file: readText,
    write_file: writeText('write'),
    append_file: writeText('append'),
    edit_file: editText,
    run_tool_command: runCommand,
  };
}

/**
 * Run a shell command with a bounded timeout. Never rejects: spawn errors,
 * non-zero exits and timeouts all come back as `success: false`.
 */
export function executeCommand(
  command: string,
  options: { cwd: string; timeoutMs: number },
): Promise<CommandResult> {
  return new Promise((resolveResult) => {
    exec(command, { cwd: options.cwd, timeout: options.timeoutMs }, (error, stdout, stderr) => {
      if (!error) {
        resolveResult({ success: true, stdout: stdout.trim(), stderr: stderr.trim() });
        return;
      }
      const reason = error.killed
        ? `Command timed out after ${options.timeoutMs} ms`
        : error.message;
      resolveResult({ success: false, stdout: stdout.trim(), stderr: stderr.trim() || reason });
    });
  });
}

/** Register the System capabilities silently. */
export function registerSystemCapabilities(
  registry: CapabilityRegistry,
  options: SystemCapabilityOptions,
): void {
  for (const [name, handle] of Object.entries(createSystemCapabilities(options))) {
    registry.register(SYSTEM_NAMESPACE, name, handle, true);
  }
}

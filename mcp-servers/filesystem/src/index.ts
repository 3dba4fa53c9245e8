/**
 * Filesystem MCP Server — Entry Point
 *
 * Sandboxed file operations over stdio (default) or HTTP+SSE.
 *
 * Tools (11):
 *   read_file, read_multiple_files, write_file, edit_file, create_directory,
 *   list_directory, directory_tree, move_file, search_files, get_file_info,
 *   list_allowed_directories
 */

import { currentHomeDir } from '../../_shared/ts/sandbox';
import { startSseServer } from '../../_shared/ts/sse-server';
import { StdioTransport } from '../../_shared/ts/transport';
import { main } from './main';

// ─── Graceful Shutdown ──────────────────────────────────────────────────────

const shutdown = new AbortController();

process.on('SIGINT', () => shutdown.abort());
process.on('SIGTERM', () => shutdown.abort());

// ─── Start ──────────────────────────────────────────────────────────────────

main(process.argv.slice(2), process.env, {
  writeStderr: (text) => process.stderr.write(text),
  exit: (code) => process.exit(code),
  startDir: process.cwd(),
  homeDir: currentHomeDir,
  createStdioTransport: () => new StdioTransport(process.stdin, process.stdout),
  startSseServer,
  signal: shutdown.signal,
}).then(
  (code) => {
    process.exitCode = code;
    process.removeAllListeners('SIGINT');
    process.removeAllListeners('SIGTERM');
  },
  (err: unknown) => {
    process.stderr.write(`fatal: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);

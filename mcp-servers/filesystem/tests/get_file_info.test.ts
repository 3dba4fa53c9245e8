import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { ToolContext } from '../../_shared/ts/mcp-base';
import { formatPermissions, getFileInfo } from '../src/tools/get_file_info';
import { createContext, invoke, resultText, setupTestDir, teardownTestDir } from './helpers';

describe('get_file_info', () => {
  let testDir: string;
  let context: ToolContext;

  beforeAll(async () => {
    testDir = await setupTestDir({ files: { 'hello.txt': 'hello' }, subdirs: ['folder'] });
    await fs.chmod(path.join(testDir, 'hello.txt'), 0o640);
    context = await createContext([testDir]);
  });

  afterAll(async () => {
    await teardownTestDir(testDir);
  });

  it('should describe a file', async () => {
    const result = await invoke(getFileInfo, { path: path.join(testDir, 'hello.txt') }, context);
    const lines = resultText(result).split('\n');

    expect(lines).toHaveLength(7);
    expect(lines[0]).toBe('size: 5');
    expect(lines[1]).toMatch(/^created: \d{4}-\d{2}-\d{2}T/);
    expect(lines[2]).toMatch(/^modified: \d{4}-\d{2}-\d{2}T/);
    expect(lines[3]).toMatch(/^accessed: \d{4}-\d{2}-\d{2}T/);
    expect(lines.slice(4)).toEqual(['isDirectory: false', 'isFile: true', 'permissions: 640']);
  });

  it('should describe a directory', async () => {
    const result = await invoke(getFileInfo, { path: path.join(testDir, 'folder') }, context);
    expect(resultText(result)).toContain('\nisDirectory: true\nisFile: false\n');
  });

  it('should fail for a missing path', async () => {
    const result = await invoke(getFileInfo, { path: path.join(testDir, 'nope') }, context);
    expect(result.isError).toBe(true);
  });
});

describe('formatPermissions', () => {
  it('should render the permission bits in octal', () => {
    expect(formatPermissions(0o100644)).toBe('644');
    expect(formatPermissions(0o40007)).toBe('007');
  });
});

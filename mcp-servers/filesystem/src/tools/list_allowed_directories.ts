/**
 * list_allowed_directories — Report the configured allowed roots.
 */

import { z } from 'zod';
import type { MCPTool, ToolResult } from '../../../_shared/ts/mcp-base';
import { textResult } from '../../../_shared/ts/mcp-base';

const paramsSchema = z.object({});

type Params = z.infer<typeof paramsSchema>;

export const listAllowedDirectories: MCPTool<Params> = {
  name: 'list_allowed_directories',
  description:
    'Returns the list of directories that this server is allowed to access. ' +
    'Use this to understand which directories are available before trying to access files.',
  paramsSchema,

  async execute(_params, { sandbox }): Promise<ToolResult> {
    return textResult(`Allowed directories:\n${sandbox.roots.join('\n')}`);
  },
};

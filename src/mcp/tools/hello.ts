/**
 * Hello Tool
 *
 * Greets the caller by the display name of their downstream profile.
 */

import { z } from 'zod';
import type { ToolFactory } from '../types.js';

const ProfileSchema = z.object({
  displayName: z.string(),
});

export const createHelloTool: ToolFactory = ({ graph }) => ({
  name: 'hello',
  description: 'Say hello using your Microsoft profile name.',
  schema: z.object({}),

  handler: async ({ credential }) => {
    const profile = await graph.get('/me', credential, ProfileSchema);
    return `Hello, ${profile.displayName}!`;
  },
});

/**
 * quire Server Entry Point
 *
 * Loads config, wires clients and serves the HTTP app on Node.
 */

import { serve } from '@hono/node-server';
import { getConfig } from '@/config/config';
import { getClients } from '@/server/clients';
import { createApp } from '@/server/app';
import { buildStartupInfo, displayStartup } from '@/utils';

const config = getConfig();

const app = createApp({
  bearerToken: config.auth.bearerToken,
  getHandler: async () => (await getClients()).documentService
});

// Build clients before accepting requests so config problems surface now
await getClients();

serve({ fetch: app.fetch, port: config.server.port }, (info) => {
  displayStartup(buildStartupInfo(config), info.port);
});

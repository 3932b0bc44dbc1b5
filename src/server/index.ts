import { serve } from '@hono/node-server';
import { loadConfig } from '../config';
import { createApp } from './app';
import { bundleClientScript } from './clientBundle';
import { loadBootTemplate, loadStory } from './content';
import { getSystemInfo } from './systemInfo';

const main = () => {
  const config = loadConfig();
  const app = createApp({
    story: loadStory(),
    bootTemplate: loadBootTemplate(),
    clientScript: bundleClientScript(),
    systemInfo: getSystemInfo,
    logRequests: config.logRequests,
  });

  serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (address) => {
    console.log(`warm-start listening on http://${address.address}:${address.port}`);
  });
};

try {
  main();
} catch (error) {
  console.error('[startup]', error instanceof Error ? error.message : error);
  process.exitCode = 1;
}

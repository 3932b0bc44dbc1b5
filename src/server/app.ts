import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { buildBootLog } from '../utils/boot';
import { interpolateStory, type Story } from '../utils/story';
import { generateWarmPoolGrid } from '../utils/warmPool';
import { renderPage } from './render';
import { hostFacts, type SystemInfo } from './systemInfo';

// Figure quoted by the story's final uptime line.
export const INSTANCES_AWARE = 790471;

export interface AppOptions {
  story: Story;
  /** Boot log lines with their `{placeholders}` still in place. */
  bootTemplate: readonly string[];
  clientScript: string;
  systemInfo: () => SystemInfo;
  logRequests?: boolean;
  now?: () => Date;
  random?: () => number;
}

export const createApp = ({
  story,
  bootTemplate,
  clientScript,
  systemInfo,
  logRequests = false,
  now = () => new Date(),
  random = Math.random,
}: AppOptions) => {
  const app = new Hono();

  if (logRequests) {
    app.use('*', logger());
  }

  // --- PAGE ---
  app.get('/', (c) => {
    const info = systemInfo();
    const facts = hostFacts(info);
    return c.html(
      renderPage({
        story: interpolateStory(story, facts),
        bootLog: buildBootLog(bootTemplate, facts),
        pool: generateWarmPoolGrid({}, random),
        hostname: info.hostname,
        cpuCount: info.cpuCount,
        clientScript,
      }),
    );
  });

  // --- MACHINE ROUTES ---
  app.get('/info', (c) => c.json(systemInfo()));
  app.get('/health', (c) =>
    c.json({ status: 'ok', timestamp: now().toISOString(), instancesAware: INSTANCES_AWARE }),
  );

  app.notFound((c) => c.text('Not Found', 404));
  app.onError((err, c) => {
    console.error(`[server] ${c.req.method} ${c.req.path} failed:`, err);
    return c.text('Internal Server Error', 500);
  });

  return app;
};

import os from 'node:os';
import type { TemplateValues } from '../utils/template';

export interface SystemInfo {
  hostname: string;
  nodeVersion: string;
  platform: string;
  kernel: string;
  architecture: string;
  cpuCount: number;
  user: string;
  home: string;
  cwd: string;
  pid: number;
}

/** Facts about the machine serving the page. */
export const getSystemInfo = (): SystemInfo => ({
  hostname: os.hostname(),
  nodeVersion: process.versions.node,
  platform: `${os.type()}-${os.release()}-${os.arch()}`,
  kernel: os.release(),
  architecture: os.arch(),
  cpuCount: os.cpus().length,
  user: process.env.USER || 'sprite',
  home: process.env.HOME || '/home/sprite',
  cwd: process.cwd(),
  pid: process.pid,
});

// Values the boot log and story placeholders can refer to.
export const hostFacts = (info: SystemInfo): TemplateValues => ({
  hostname: info.hostname,
  user: info.user,
  kernel: info.kernel,
  cpuCount: info.cpuCount,
  memoryGb: info.cpuCount * 4,
});

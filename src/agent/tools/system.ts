import os from "node:os";
import { Tool, toolSuccess, type ToolResult } from "./base.js";

function formatBytes(bytes: number): string {
  const gb = bytes / 1024 ** 3;
  return `${gb.toFixed(1)} GB`;
}

function formatUptime(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return days > 0 ? `${days}d ${hours}h ${minutes}m` : `${hours}h ${minutes}m`;
}

/** Report host OS, CPU, memory and uptime. */
export class SystemInfoTool extends Tool {
  readonly name = "system_info";
  readonly description =
    "Get information about this computer: OS, CPU, memory and uptime.";
  readonly parameters = {
    type: "object",
    properties: {},
  };

  async execute(): Promise<ToolResult> {
    const cpus = os.cpus();
    const total = os.totalmem();
    const free = os.freemem();
    const data = {
      platform: os.platform(),
      release: os.release(),
      arch: os.arch(),
      hostname: os.hostname(),
      cpuModel: cpus[0]?.model ?? "unknown",
      cpuCount: cpus.length,
      totalMemory: total,
      freeMemory: free,
      uptimeSeconds: Math.round(os.uptime()),
    };

    const lines = [
      `OS: ${data.platform} ${data.release} (${data.arch})`,
      `Host: ${data.hostname}`,
      `CPU: ${data.cpuModel} x${data.cpuCount}`,
      `Memory: ${formatBytes(total - free)} used of ${formatBytes(total)}`,
      `Uptime: ${formatUptime(data.uptimeSeconds)}`,
    ];
    return toolSuccess(lines.join("\n"), data);
  }
}

// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import {inject, injectable} from 'tsyringe-neo';
import {type MemoryUsage, type SystemClient} from '../system-client.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {type ShellRunner} from '../../../core/shell-runner.js';
import {shellQuote} from '../../../core/helpers.js';
import {DeployError} from '../../../core/errors/deploy-error.js';

const BYTES_PER_MB = 1024 * 1024;
const MEMINFO_PATH = '/proc/meminfo';

@injectable()
export class DefaultSystemClient implements SystemClient {
  private readonly shellRunner: ShellRunner;

  public constructor(@inject(InjectTokens.ShellRunner) shellRunner?: ShellRunner) {
    this.shellRunner = patchInject(shellRunner, InjectTokens.ShellRunner, this.constructor.name);
  }

  public memory(): MemoryUsage {
    const totalMb = Math.floor(os.totalmem() / BYTES_PER_MB);
    // free memory leaves out reclaimable caches, MemAvailable does not
    const available = fs.existsSync(MEMINFO_PATH)
      ? DefaultSystemClient.parseMemAvailableKb(fs.readFileSync(MEMINFO_PATH, 'utf8'))
      : undefined;
    const availableMb = available === undefined ? Math.floor(os.freemem() / BYTES_PER_MB) : Math.floor(available / 1024);
    return {totalMb, availableMb};
  }

  public cpuCount(): number {
    return os.cpus().length;
  }

  public async diskUsagePercent(path: string): Promise<number> {
    const lines = await this.shellRunner.run(`df -P ${shellQuote(path)}`);
    return DefaultSystemClient.parseDiskUsage(lines);
  }

  public pathExists(path: string): boolean {
    return fs.existsSync(path);
  }

  public async removePath(path: string): Promise<void> {
    await fs.promises.rm(path, {recursive: true, force: true});
  }

  public async listServices(nameFilter: string): Promise<string[]> {
    const lines = await this.shellRunner.run('systemctl list-unit-files --type=service --no-legend --no-pager');
    return lines
      .map(line => line.trim().split(/\s+/)[0])
      .filter(unit => unit !== undefined && unit.includes(nameFilter));
  }

  public async stopAndDisableService(name: string): Promise<void> {
    await this.shellRunner.run(`systemctl stop ${shellQuote(name)}`);
    await this.shellRunner.run(`systemctl disable ${shellQuote(name)}`);
  }

  /** The MemAvailable value of /proc/meminfo in kB, if present. */
  public static parseMemAvailableKb(meminfo: string): number | undefined {
    const match = /^MemAvailable:\s+(\d+)\s+kB$/m.exec(meminfo);
    return match ? Number.parseInt(match[1], 10) : undefined;
  }

  /**
   * Reads the capacity column of `df -P` output.
   *
   * @throws DeployError if the output has no data line
   */
  public static parseDiskUsage(lines: readonly string[]): number {
    const data = lines.at(-1);
    const capacity = data?.trim().split(/\s+/)[4];
    if (lines.length < 2 || capacity === undefined || !capacity.endsWith('%')) {
      throw new DeployError(`unexpected df output: ${lines.join(' / ')}`);
    }
    return Number.parseInt(capacity, 10);
  }
}

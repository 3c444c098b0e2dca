import type { Command } from 'commander';
import { HealthCheckUseCase } from '../../application/HealthCheckUseCase.js';
import { OutputFormatter, parseOutputFormat } from '../formatters/OutputFormatter.js';
import { loadCommandConfig, withCommonOptions, type CommonOptions } from './common.js';

interface HealthOptions extends CommonOptions {
  format: string;
}

/** 註冊 health 指令 */
export function registerHealthCommand(program: Command): void {
  withCommonOptions(
    program
      .command('health')
      .description('Check external tools, directories and API key')
      .option('--format <format>', 'Output format: json or text', 'text'),
  ).action(async (opts: HealthOptions) => {
    const format = parseOutputFormat(opts.format);
    const config = loadCommandConfig(opts);

    const report = await new HealthCheckUseCase(config).check();

    process.stdout.write(new OutputFormatter().formatObject(report, format) + '\n');
    process.exitCode = report.healthy ? 0 : 1;
  });
}

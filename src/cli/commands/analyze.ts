import type { Command } from 'commander';
import { LogAnalyzerUseCase } from '../../application/LogAnalyzerUseCase.js';
import type { Methodology } from '../../domain/entities/SessionRecord.js';
import { SessionFormatter, type OutputFormat } from '../formatters/SessionFormatter.js';
import { parseFormat, parseMethodology } from './options.js';
import { createRuntime } from './runtime.js';

interface AnalyzeOptions {
  methodology?: Methodology;
  session?: string;
  recommendations?: boolean;
  format: OutputFormat;
}

/** 註冊 analyze 指令 */
export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze')
    .description('Compare logged sessions by methodology')
    .option('--methodology <methodology>', 'Only include one methodology', parseMethodology)
    .option('--session <id>', 'Analyze a single session')
    .option('--recommendations', 'Append recommendations to the report')
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .action(async (opts: AnalyzeOptions) => {
      const { store, logger } = createRuntime();
      const analyzer = new LogAnalyzerUseCase(store, logger.child('analyzer'));
      const formatter = new SessionFormatter();

      if (opts.session) {
        const analysis = analyzer.analyzeSession(opts.session);
        process.stdout.write(formatter.formatSessionAnalysis(analysis, opts.format) + '\n');
        return;
      }

      const stats = analyzer.compareMethodologies({ methodology: opts.methodology });

      if (opts.format === 'json') {
        const report = {
          methodologies: Object.fromEntries(stats),
          comparison: analyzer.compareDirect(stats),
          ...(opts.recommendations ? { recommendations: analyzer.recommend(stats) } : {}),
        };
        process.stdout.write(formatter.formatObject(report, 'json') + '\n');
        return;
      }

      process.stdout.write(
        analyzer.generateReport(stats, { recommendations: opts.recommendations ?? false }) + '\n',
      );
    });
}

/**
 * strata recall: ranked nodes and experiences about a topic.
 */

import type { Command } from 'commander';
import type { RecallItem } from '../../types/index.js';
import { parseInteger, parseNumber, withCommonOptions, type CommonOptions } from '../options.js';
import { runWithStrata } from '../workspace.js';

interface RecallOptions extends CommonOptions {
  limit?: number;
  minRelevance?: number;
}

function toRow(item: RecallItem): Record<string, unknown> {
  return {
    source: item.source,
    id: item.id,
    type: item.type,
    text: item.source === 'node' ? item.name : item.content,
    score: item.score,
  };
}

export function registerRecallCommand(program: Command): void {
  withCommonOptions(
    program
      .command('recall [topic]')
      .description('Recall knowledge and experiences, most relevant first')
      .option('-l, --limit <n>', 'Maximum results (1-50)', parseInteger)
      .option('--min-relevance <value>', 'Drop experiences below this relevance (0-1)', parseNumber)
  ).action(async (topic: string | undefined, opts: RecallOptions) => {
    await runWithStrata(opts, async (strata) => {
      const result = await strata.intelligence.recall({
        topic,
        limit: opts.limit,
        minRelevance: opts.minRelevance,
      });
      return opts.format === 'json' ? result : result.items.map(toRow);
    });
  });
}

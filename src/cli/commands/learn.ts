/**
 * strata learn: store a fact, routed by confidence.
 */

import type { Command } from 'commander';
import { CONFIDENCE_LEVELS, EXPERIENCE_TYPES } from '../../types/index.js';
import type { Confidence, ExperienceType } from '../../types/index.js';
import { choice, parseList, withCommonOptions, type CommonOptions } from '../options.js';
import { runWithStrata } from '../workspace.js';

interface LearnOptions extends CommonOptions {
  type: ExperienceType;
  confidence: Confidence;
  context?: string;
  tags?: string[];
}

export function registerLearnCommand(program: Command): void {
  withCommonOptions(
    program
      .command('learn <content>')
      .description('Learn a fact: high confidence becomes a permanent node, otherwise a decaying experience')
      .requiredOption(
        '-t, --type <type>',
        `Experience type: ${EXPERIENCE_TYPES.join(', ')}`,
        choice(EXPERIENCE_TYPES)
      )
      .option(
        '-c, --confidence <level>',
        `Confidence: ${CONFIDENCE_LEVELS.join(', ')}`,
        choice(CONFIDENCE_LEVELS),
        'high'
      )
      .option('--context <text>', 'Where or when this applies')
      .option('--tags <list>', 'Comma-separated tags', parseList)
  ).action(async (content: string, opts: LearnOptions) => {
    await runWithStrata(opts, (strata) =>
      strata.intelligence.learn({
        content,
        type: opts.type,
        confidence: opts.confidence,
        context: opts.context,
        tags: opts.tags,
      })
    );
  });
}

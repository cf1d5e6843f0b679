/**
 * Completion Resolver
 *
 * Decides what to offer for the word under the cursor. The complete words
 * before it build a CompletionContext; the current word is then matched
 * against, in order:
 *
 *   1. a platform selector being typed    -> platform identifiers
 *   2. a flag waiting for its value       -> that flag's values
 *   3. no platform known                  -> `-Dplatform=<id>` selectors
 *   4. no subcommand yet                  -> subcommand keywords
 *   5. the name or version slot           -> package names or versions
 *
 * When the line has a subcommand but no platform selector, the default
 * platform from the settings stands in before falling back to 3.
 */

import type { PrefixEnumerator } from './prefix-enumerator.js';
import { tokenizeLine } from './tokenizer.js';
import {
  PLATFORM_SELECTOR,
  allSubcommandKeywords,
  buildCompletionContext,
  type CompletionContext
} from './completion-context.js';
import { describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

interface Offer {
  candidates: string[];
  /** Text the candidates must start with */
  typed: string;
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

async function platformSelectors(enumerator: PrefixEnumerator): Promise<string[]> {
  return (await enumerator.platforms()).map(platform => `${PLATFORM_SELECTOR}${platform}`);
}

async function decide(context: CompletionContext, current: string, enumerator: PrefixEnumerator): Promise<Offer> {
  if (current.startsWith(PLATFORM_SELECTOR)) {
    return { candidates: await enumerator.platforms(), typed: current.slice(PLATFORM_SELECTOR.length) };
  }

  if (context.pendingFlag !== undefined) {
    return { candidates: await enumerator.flagValues(context.pendingFlag, context.platform), typed: current };
  }

  const { stage } = context;
  let platform = context.platform;
  if (platform === undefined && stage.kind !== 'NoSubcommand') {
    platform = await enumerator.defaultPlatform();
  }
  if (platform === undefined) {
    return { candidates: await platformSelectors(enumerator), typed: current };
  }

  switch (stage.kind) {
    case 'NoSubcommand':
      return { candidates: allSubcommandKeywords(), typed: current };
    case 'CollectingName':
      return {
        candidates: stage.subcommand === 'install'
          ? await enumerator.installablePackages()
          : await enumerator.installedPackages(platform),
        typed: current
      };
    case 'CollectingVersion':
      return {
        candidates: stage.subcommand === 'install'
          ? await enumerator.installableVersions(platform, stage.name)
          : await enumerator.installedVersions(platform, stage.name),
        typed: current
      };
    case 'Done':
      return { candidates: [], typed: current };
  }
}

/**
 * Candidates for the word at `cursorPosition` in `typedLine`.
 * The first word is the program name. Enumeration failures yield no
 * candidates.
 */
export async function resolveCompletions(
  typedLine: string,
  cursorPosition: number,
  enumerator: PrefixEnumerator
): Promise<string[]> {
  const { complete, current } = tokenizeLine(typedLine, cursorPosition);
  const context = buildCompletionContext(complete.slice(1));
  logger.debug('Completion context', { context, current });

  try {
    const offer = await decide(context, current, enumerator);
    return unique(offer.candidates.filter(candidate => candidate.startsWith(offer.typed)));
  } catch (error) {
    logger.debug(`Completion enumeration failed: ${describeError(error)}`);
    return [];
  }
}

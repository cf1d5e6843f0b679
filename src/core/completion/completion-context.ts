/**
 * Completion Context
 *
 * The parse state of a partially typed command line, rebuilt from scratch
 * for every request. Positional progress is a tagged union, so a version
 * can only be present together with a name and a subcommand; the platform
 * and a flag awaiting its value are tracked beside it because they can
 * appear anywhere on the line.
 */

import { PLATFORM_DEFINITION, SUBCOMMAND_KEYWORDS, type Subcommand } from '../../constants/index.js';

export type ParseStage =
  | { kind: 'NoSubcommand' }
  | { kind: 'CollectingName'; subcommand: Subcommand }
  | { kind: 'CollectingVersion'; subcommand: Subcommand; name: string }
  | { kind: 'Done'; subcommand: Subcommand; name: string; version: string };

export interface CompletionContext {
  platform?: string;
  stage: ParseStage;
  /** Flag whose value is the next word */
  pendingFlag?: string;
}

export const PLATFORM_SELECTOR = `-D${PLATFORM_DEFINITION}=`;

const DEFINE_FLAGS: ReadonlySet<string> = new Set(['-D', '--define']);
const DEFINE_PLATFORM_PATTERN = new RegExp(`^--define=${PLATFORM_DEFINITION}=(.+)$`);
const VALUE_FLAG_PATTERN = /^-.$|^--[^=]+$/;
/** Flags that never take a value */
const SWITCHES: ReadonlySet<string> = new Set([
  '-y', '--yes', '--dry-run', '--verbose', '--script', '-h', '--help', '-V', '--version'
]);

export const INITIAL_CONTEXT: CompletionContext = { stage: { kind: 'NoSubcommand' } };

const SUBCOMMANDS: readonly Subcommand[] = ['install', 'remove', 'show'];
const KEYWORDS: Readonly<Record<Subcommand, readonly string[]>> = SUBCOMMAND_KEYWORDS;

/**
 * Canonical subcommand for a keyword or one of its synonyms
 */
export function canonicalSubcommand(word: string): Subcommand | undefined {
  return SUBCOMMANDS.find(subcommand => KEYWORDS[subcommand].includes(word));
}

/**
 * Every keyword, canonical names first, then synonyms
 */
export function allSubcommandKeywords(): string[] {
  return [...SUBCOMMANDS, ...SUBCOMMANDS.flatMap(subcommand => KEYWORDS[subcommand].slice(1))];
}

/**
 * Platform named by a selector word (`-Dplatform=<id>` or
 * `--define=platform=<id>`), if it is one with a non-empty value
 */
export function platformFromSelector(word: string): string | undefined {
  if (word.startsWith(PLATFORM_SELECTOR) && word.length > PLATFORM_SELECTOR.length) {
    return word.slice(PLATFORM_SELECTOR.length);
  }
  return DEFINE_PLATFORM_PATTERN.exec(word)?.[1];
}

function fillPositional(stage: ParseStage, word: string): ParseStage {
  switch (stage.kind) {
    case 'CollectingName':
      return { kind: 'CollectingVersion', subcommand: stage.subcommand, name: word };
    case 'CollectingVersion':
      return { kind: 'Done', subcommand: stage.subcommand, name: stage.name, version: word };
    case 'NoSubcommand':
    case 'Done':
      // Not a positional slot; ignored
      return stage;
  }
}

/**
 * Advance the context by one complete word.
 */
export function advance(context: CompletionContext, word: string): CompletionContext {
  if (context.pendingFlag !== undefined) {
    const { pendingFlag, ...rest } = context;
    const prefix = `${PLATFORM_DEFINITION}=`;
    if (DEFINE_FLAGS.has(pendingFlag) && word.startsWith(prefix) && word.length > prefix.length) {
      return { ...rest, platform: word.slice(prefix.length) };
    }
    return rest;
  }

  const platform = platformFromSelector(word);
  if (platform !== undefined) {
    return { ...context, platform };
  }

  if (context.stage.kind === 'NoSubcommand') {
    const subcommand = canonicalSubcommand(word);
    if (subcommand) {
      return { ...context, stage: { kind: 'CollectingName', subcommand } };
    }
  }

  if (SWITCHES.has(word)) {
    return context;
  }
  if (VALUE_FLAG_PATTERN.test(word)) {
    return { ...context, pendingFlag: word };
  }
  if (word.startsWith('-')) {
    // Flags with inline values
    return context;
  }

  return { ...context, stage: fillPositional(context.stage, word) };
}

/**
 * Context after the given words (program name excluded).
 */
export function buildCompletionContext(words: readonly string[]): CompletionContext {
  return words.reduce(advance, INITIAL_CONTEXT);
}

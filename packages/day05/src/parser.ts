import {
  MalformedInputError,
  MalformedRuleError,
  parseUnsignedInt,
  splitSections,
  type PuzzleError,
} from '@advent/shared';
import { err, ok, Result } from 'neverthrow';

import type { PrintQueue, Rule, Sequence } from './types.js';

/**
 * Parses the rules section (`X|Y` per line) and the sequences section (`a,b,c` per line), separated by
 * a blank line. Whitespace around tokens is ignored.
 */
export function parseInput(input: string): Result<PrintQueue, PuzzleError> {
  const sections = splitSections(input);
  const [rulesSection, sequencesSection] = sections;
  if (sections.length !== 2 || rulesSection === undefined || sequencesSection === undefined) {
    return err(
      new MalformedInputError(`Input must have exactly 2 sections, found ${String(sections.length)}`, sections.length)
    );
  }

  const rules = Result.combine(sectionLines(rulesSection).map(parseRule));
  if (rules.isErr()) {
    return err(rules.error);
  }

  const sequences = Result.combine(sectionLines(sequencesSection).map(parseSequence));
  if (sequences.isErr()) {
    return err(sequences.error);
  }

  return ok({ rules: rules.value, sequences: sequences.value });
}

export function parseRule(line: string): Result<Rule, PuzzleError> {
  const tokens = line.split('|');
  const [before, after] = tokens;
  if (tokens.length !== 2 || before === undefined || after === undefined) {
    return err(new MalformedRuleError(line));
  }

  return parseUnsignedInt(before).andThen((beforePage) =>
    parseUnsignedInt(after).map((afterPage): Rule => [beforePage, afterPage])
  );
}

export function parseSequence(line: string): Result<Sequence, PuzzleError> {
  return Result.combine(line.split(',').map(parseUnsignedInt));
}

function sectionLines(section: string): string[] {
  return section.split(/\r?\n/);
}

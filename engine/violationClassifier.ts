// engine/violationClassifier.ts
//
// Pure predicate + extractor for English Language Proficiency violations.
// Malformed or missing fields make a row non-matching; nothing here throws.

import {
  OOS_TRUTHY_VALUES,
  TARGET_DESCRIPTION_KEYWORDS,
  TARGET_PART_NO,
  TARGET_SECTION_CANONICAL
} from './constants';
import { normalizeCodeText, toSafeTrimmedString } from './normalizeFields';
import { TARGET_SECTION_WITH_SUFFIX } from './regex';
import type { ViolationRecord } from './types';

export interface ClassifierOptions {
  matchDescriptionKeywords: boolean;
}

export interface ViolationClassification {
  is_target: boolean;
  is_oos: boolean;
}

export interface NormalizedViolationCode {
  part: string;
  section: string;
}

/**
 * Split part/section into their canonical forms.
 *
 * The SODA API carries one combined code ("391.11B2", "391.11(B)(2)") with no
 * separate part column; in that case the part is taken from the section prefix.
 * Exports that repeat the part inside the section get the same treatment.
 */
export function normalizeViolationCode(partRaw: unknown, sectionRaw: unknown): NormalizedViolationCode {
  let part = normalizeCodeText(partRaw);
  let section = normalizeCodeText(sectionRaw);

  if (
    (!part || part === TARGET_PART_NO) &&
    section.startsWith(TARGET_PART_NO) &&
    section.length > TARGET_PART_NO.length
  ) {
    part = TARGET_PART_NO;
    section = section.slice(TARGET_PART_NO.length);
  }

  return { part, section };
}

/**
 * "11(B)(2)", "11B2", "11b2-s", "11B2-Z" → true; "11B3", "11B21" → false.
 */
export function isTargetSection(sectionRaw: unknown): boolean {
  const section = normalizeCodeText(sectionRaw);
  return section === TARGET_SECTION_CANONICAL || TARGET_SECTION_WITH_SUFFIX.test(section);
}

export function isTargetViolation(
  record: Pick<ViolationRecord, 'part_no' | 'section' | 'description'>,
  options: ClassifierOptions = { matchDescriptionKeywords: false }
): boolean {
  const { part, section } = normalizeViolationCode(record.part_no, record.section);
  if (part !== TARGET_PART_NO) return false;

  if (isTargetSection(section)) return true;

  if (options.matchDescriptionKeywords) {
    const desc = toSafeTrimmedString(record.description).toLowerCase();
    return TARGET_DESCRIPTION_KEYWORDS.some((kw) => desc.includes(kw));
  }

  return false;
}

/** "Y", " yes ", "TRUE", "1" → true; "N", "", undefined → false. */
export function isOutOfService(raw: unknown): boolean {
  return OOS_TRUTHY_VALUES.has(toSafeTrimmedString(raw).toLowerCase());
}

export function classifyViolation(
  record: ViolationRecord,
  options: ClassifierOptions
): ViolationClassification {
  return {
    is_target: isTargetViolation(record, options),
    is_oos: isOutOfService(record.oos_indicator)
  };
}

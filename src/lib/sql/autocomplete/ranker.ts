/**
 * Ranker Module
 *
 * Prefix filtering, case matching and de-duplication. Candidates keep the
 * order they were generated in; there is no scoring.
 */

import type { Candidate } from './types'

/**
 * Check if a candidate value starts with the typed text. ASCII letters
 * compare case-insensitively; typed text longer than the candidate never
 * matches.
 */
export function isMatch(partial: string, value: string): boolean {
  if (partial.length > value.length) return false
  for (let i = 0; i < partial.length; i++) {
    if (asciiLower(partial[i]) !== asciiLower(value[i])) return false
  }
  return true
}

function asciiLower(ch: string): string {
  return ch >= 'A' && ch <= 'Z' ? ch.toLowerCase() : ch
}

/**
 * True if every character of the typed text is a lowercase ASCII letter.
 * Empty input counts as lowercase.
 */
export function isAllLowercase(text: string): boolean {
  return /^[a-z]*$/.test(text)
}

/**
 * Render a keyword in the case the user is typing in.
 */
export function matchCase(typed: string, keyword: string): string {
  return isAllLowercase(typed) ? keyword.toLowerCase() : keyword
}

/**
 * Remove duplicate candidate values, keeping the first occurrence.
 */
export function deduplicateCandidates(candidates: Candidate[]): Candidate[] {
  const seen = new Set<string>()
  return candidates.filter((candidate) => {
    if (seen.has(candidate.value)) return false
    seen.add(candidate.value)
    return true
  })
}

export function filterCandidates(candidates: Candidate[], partial: string): Candidate[] {
  return candidates.filter((candidate) => isMatch(partial, candidate.value))
}

import { createLogger } from '../common/logger.js';

const log = createLogger('util:patterns');

/**
 * SQL LIKE pattern matching.
 * - % matches any sequence of characters (including empty sequence)
 * - _ matches any single character
 * There is no escape character.
 *
 * @param pattern The LIKE pattern
 * @param text The text to match against
 * @param caseSensitive When false, letters match regardless of case
 * @returns true if the whole text matches the pattern
 */
export function simpleLike(pattern: string, text: string, caseSensitive = true): boolean {
	return likeToRegExp(pattern, caseSensitive).test(text);
}

/** Compiles a LIKE pattern into an anchored regular expression. */
export function likeToRegExp(pattern: string, caseSensitive = true): RegExp {
	// Escape regex special characters except % and _
	const escapedPattern = pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
	// Convert SQL LIKE wildcards to regex equivalents
	const regexPattern = escapedPattern.replace(/%/g, '[\\s\\S]*').replace(/_/g, '[\\s\\S]');

	const regex = new RegExp(`^${regexPattern}$`, caseSensitive ? '' : 'i');
	log('Compiled LIKE pattern %s to %s', pattern, regex);
	return regex;
}

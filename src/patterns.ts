/**
 * Characters a tag name may not contain.  Commas never reach this check
 * because they separate tags in a tag list.
 *
 * Note: This pattern deliberately has no `g` flag to avoid issues with
 * `test()` being stateful on global regexes.
 */
export const TAG_REJECTED_CHARACTERS = /[<>/\\#?&%"'`{}[\]|^;=]/u;

/**
 * Characters kept in a tag slug besides letters and digits.
 * URL safe in ABNF is: ALPHA / DIGIT / "-" / "." / "_" / "~"
 */
export const SLUG_UNSAFE_CHARACTERS = /[^\p{L}\p{N}\-._~]/gu;

/**
 * Usernames as accepted at registration: letters, digits and `@.+-_`.
 */
export const USERNAME_PATTERN = /^[\p{L}\p{N}@.+\-_]+$/u;

import type { Post } from "../feed/types.js";
import type { FilterCriteria } from "./criteria.js";

export type ExclusionReason =
	| "too-recent"
	| "reply"
	| "repost"
	| "before-range"
	| "after-range"
	| "no-pattern-match";

/**
 * First filter step a post fails, or null when it qualifies.
 * Steps run in order: age, type, date range, text patterns. Type is only
 * looked at for posts already older than the cutoff.
 */
export function findExclusion(
	post: Post,
	criteria: FilterCriteria,
): ExclusionReason | null {
	if (post.indexedAt >= criteria.cutoff) return "too-recent";

	if (post.isReply && !criteria.includeReplies) return "reply";
	if (post.isRepost && !criteria.includeReposts) return "repost";

	if (criteria.after && post.indexedAt < criteria.after) return "before-range";
	if (criteria.before && post.indexedAt > criteria.before) return "after-range";

	if (
		criteria.patterns.length > 0 &&
		!criteria.patterns.some((matcher) => matcher.test(post.text))
	) {
		return "no-pattern-match";
	}

	return null;
}

export function matchesCriteria(post: Post, criteria: FilterCriteria): boolean {
	return findExclusion(post, criteria) === null;
}

import { ConfigError } from "../errors.js";
import { subtractDays } from "../utils/time.js";

export type TextMatcher = {
	source: string;
	test(text: string): boolean;
};

export type FilterCriteria = Readonly<{
	cutoff: Date;
	after?: Date;
	before?: Date;
	patterns: readonly TextMatcher[];
	useRegex: boolean;
	includeReplies: boolean;
	includeReposts: boolean;
}>;

export type FilterCriteriaInput = {
	daysOld: number;
	now?: Date;
	after?: Date;
	before?: Date;
	patterns?: readonly string[];
	useRegex?: boolean;
	includeReplies?: boolean;
	includeReposts?: boolean;
};

export function buildFilterCriteria(input: FilterCriteriaInput): FilterCriteria {
	if (!Number.isFinite(input.daysOld) || input.daysOld < 0) {
		throw new ConfigError(
			`days must be a non-negative number, got ${input.daysOld}`,
		);
	}

	const useRegex = input.useRegex ?? false;
	const patterns = (input.patterns ?? []).map((pattern) =>
		useRegex ? regexMatcher(pattern) : substringMatcher(pattern),
	);

	return Object.freeze({
		cutoff: subtractDays(input.now ?? new Date(), input.daysOld),
		after: input.after,
		before: input.before,
		patterns: Object.freeze(patterns),
		useRegex,
		includeReplies: input.includeReplies ?? false,
		includeReposts: input.includeReposts ?? false,
	});
}

function substringMatcher(pattern: string): TextMatcher {
	const needle = pattern.toLowerCase();
	return {
		source: pattern,
		test: (text) => text.toLowerCase().includes(needle),
	};
}

function regexMatcher(pattern: string): TextMatcher {
	let regex: RegExp;
	try {
		// No "g" flag: test() must not carry lastIndex between posts.
		regex = new RegExp(pattern, "i");
	} catch (error) {
		throw new ConfigError(`Invalid --match regex '${pattern}'`, {
			cause: error,
		});
	}
	return { source: pattern, test: (text) => regex.test(text) };
}

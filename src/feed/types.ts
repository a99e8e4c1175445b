export type EmbedKind =
	| { kind: "none" }
	| { kind: "repostView" }
	| { kind: "other"; type?: string };

export type Post = {
	uri: string;
	text: string;
	indexedAt: Date;
	isReply: boolean;
	isRepost: boolean;
	embed: EmbedKind;
	/** Post view exactly as the service returned it. */
	raw: Readonly<Record<string, unknown>>;
};

export type FeedPage = {
	posts: Post[];
	nextCursor?: string;
};

export type AuthorFeedResponse = {
	feed: unknown[];
	cursor?: string;
};

/** The two remote operations a run needs. */
export interface FeedService {
	getAuthorFeed(params: {
		actor: string;
		cursor?: string;
		limit: number;
	}): Promise<AuthorFeedResponse>;
	deleteRecord(params: {
		repo: string;
		collection: string;
		rkey: string;
	}): Promise<void>;
}

import { z } from "zod";
import { parseUtcTimestamp } from "../utils/time.js";
import type { EmbedKind, Post } from "./types.js";

export const REPOST_VIEW_TYPE = "app.bsky.embed.record#view";

const embedSchema = z.object({ $type: z.string().optional() }).passthrough();

const postViewSchema = z
	.object({
		uri: z.string().min(1),
		indexedAt: z.string(),
		record: z
			.object({
				text: z.string().optional(),
				reply: z.unknown().optional(),
			})
			.passthrough(),
		embed: embedSchema.optional(),
	})
	.passthrough();

const feedItemSchema = z
	.object({
		post: postViewSchema,
		reply: z.unknown().optional(),
	})
	.passthrough();

export type DecodeResult =
	| { ok: true; post: Post }
	| { ok: false; uri?: string; reason: string };

/** An embed without a `$type` is still an embed; it classifies as other. */
export function classifyEmbed(embed: { $type?: string } | undefined): EmbedKind {
	if (!embed) return { kind: "none" };
	if (embed.$type === REPOST_VIEW_TYPE) return { kind: "repostView" };
	return { kind: "other", type: embed.$type };
}

/** Turns one author-feed item into a Post, classifying reply and repost once. */
export function decodeFeedItem(item: unknown): DecodeResult {
	const parsed = feedItemSchema.safeParse(item);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue?.path.join(".") || "item";
		return {
			ok: false,
			uri: readUri(item),
			reason: `${where}: ${issue?.message ?? "invalid feed item"}`,
		};
	}

	const { post, reply } = parsed.data;
	const indexedAt = parseUtcTimestamp(post.indexedAt);
	if (!indexedAt) {
		return {
			ok: false,
			uri: post.uri,
			reason: `unparseable indexedAt '${post.indexedAt}'`,
		};
	}

	const embed = classifyEmbed(post.embed);
	const isReply = reply != null || post.record.reply != null;
	const isRepost = embed.kind === "repostView";

	return {
		ok: true,
		post: {
			uri: post.uri,
			text: post.record.text ?? "",
			indexedAt,
			isReply,
			isRepost,
			embed,
			raw: post,
		},
	};
}

function readUri(item: unknown): string | undefined {
	const result = z
		.object({ post: z.object({ uri: z.string() }) })
		.safeParse(item);
	return result.success ? result.data.post.uri : undefined;
}

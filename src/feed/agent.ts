import { AtpAgent } from "@atproto/api";
import { AuthenticationError, describeError } from "../errors.js";
import type { FeedService } from "./types.js";

export type Session = {
	service: FeedService;
	/** DID when the server returned one, otherwise the handle used to log in. */
	repo: string;
	handle: string;
};

export function createAgentFeedService(agent: AtpAgent): FeedService {
	return {
		async getAuthorFeed({ actor, cursor, limit }) {
			const response = await agent.getAuthorFeed({ actor, cursor, limit });
			return { feed: response.data.feed, cursor: response.data.cursor };
		},
		async deleteRecord({ repo, collection, rkey }) {
			await agent.com.atproto.repo.deleteRecord({ repo, collection, rkey });
		},
	};
}

export async function login(args: {
	serviceUrl: string;
	identifier: string;
	password: string;
}): Promise<Session> {
	const agent = new AtpAgent({ service: args.serviceUrl });

	try {
		await agent.login({
			identifier: args.identifier,
			password: args.password,
		});
	} catch (error) {
		throw new AuthenticationError(
			`Login as '${args.identifier}' failed: ${describeError(error)}`,
			{ cause: error },
		);
	}

	return {
		service: createAgentFeedService(agent),
		repo: agent.session?.did ?? args.identifier,
		handle: agent.session?.handle ?? args.identifier,
	};
}

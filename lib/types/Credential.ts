/**
 * Credential handed to the engine by an external resolver.
 * The engine only turns it into an Authorization header.
 */
export type Credential =
    | { type: 'basic'; username: string; password: string }
    | { type: 'bearer'; token: string };

/**
 * Parsed WWW-Authenticate challenge attached to Unauthorized errors so that
 * the resolver knows where to obtain a token.
 */
export interface AuthChallenge {
    scheme: string;
    realm?: string;
    service?: string;
    scope?: string;
}

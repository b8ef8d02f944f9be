import { CorruptCredentialError, TokenExpiredError, TokenInvalidError } from "../tenant/TenantErrors";
import { getLog } from "../util/Logger";
import { hash, type Options as Argon2Options, verify } from "@node-rs/argon2";
import jwt, { type Algorithm, type JwtPayload } from "jsonwebtoken";
import type { StringValue } from "ms";
import ms from "ms";
import { z } from "zod";

const log = getLog(import.meta);

const ARGON2_PHC_REGEX = /^\$argon2(id|i|d)\$/;

/**
 * Claims of an administrator token. `iat` and `exp` are seconds since the epoch.
 */
export interface TokenClaims {
	sub: string;
	orgId: string;
	email: string;
	iat: number;
	exp: number;
}

const TokenClaimsSchema = z.object({
	sub: z.string().min(1),
	orgId: z.string().min(1),
	email: z.string().min(1),
	iat: z.number().int(),
	exp: z.number().int(),
});

/**
 * Token lifetime: an `ms` duration ("60m") or a number of seconds.
 */
export type TokenTtl = StringValue | number;

export type CredentialHashOptions = Pick<Argon2Options, "memoryCost" | "timeCost" | "parallelism">;

export interface CredentialServiceOptions {
	tokenSecret: string;
	tokenAlgorithm: Algorithm;
	tokenExpiresIn: TokenTtl;
	/** argon2id cost parameters; the library defaults apply when omitted */
	hashOptions?: CredentialHashOptions;
	/** Milliseconds since the epoch. Defaults to Date.now. */
	clock?: () => number;
}

function ttlToSeconds(ttl: TokenTtl): number {
	const seconds = typeof ttl === "number" ? ttl : ms(ttl) / 1000;
	if (!Number.isFinite(seconds) || seconds <= 0) {
		throw new RangeError(`Invalid token lifetime: ${String(ttl)}`);
	}
	return Math.floor(seconds);
}

/**
 * Password hashing and administrator token issuance. Holds the signing secret; nothing else
 * in the process reads it.
 */
export class CredentialService {
	private readonly clock: () => number;
	private readonly defaultTtlSeconds: number;

	constructor(private readonly options: CredentialServiceOptions) {
		this.clock = options.clock ?? Date.now;
		this.defaultTtlSeconds = ttlToSeconds(options.tokenExpiresIn);
	}

	/**
	 * argon2id with a random salt; the result is a self-describing PHC string.
	 */
	hash(password: string): Promise<string> {
		return hash(password, this.options.hashOptions);
	}

	/**
	 * Resolves false on a wrong password.
	 *
	 * @throws CorruptCredentialError when the stored hash cannot be parsed
	 */
	async verify(password: string, passwordHash: string): Promise<boolean> {
		if (!ARGON2_PHC_REGEX.test(passwordHash)) {
			throw new CorruptCredentialError();
		}
		try {
			return await verify(passwordHash, password);
		} catch (error) {
			log.error(error, "Unable to verify password against stored hash");
			throw new CorruptCredentialError("Stored password hash is malformed", { cause: error });
		}
	}

	issueToken(adminId: string, orgId: string, email: string, ttl?: TokenTtl): string {
		const iat = Math.floor(this.clock() / 1000);
		const exp = iat + (ttl === undefined ? this.defaultTtlSeconds : ttlToSeconds(ttl));
		const claims: TokenClaims = { sub: adminId, orgId, email, iat, exp };
		return jwt.sign(claims, this.options.tokenSecret, { algorithm: this.options.tokenAlgorithm });
	}

	/**
	 * Checks signature, algorithm and expiry, then returns the claims as issued.
	 * A token is expired from its `exp` second on.
	 */
	verifyToken(token: string): TokenClaims {
		let decoded: string | JwtPayload;
		try {
			decoded = jwt.verify(token, this.options.tokenSecret, {
				algorithms: [this.options.tokenAlgorithm],
				clockTimestamp: Math.floor(this.clock() / 1000),
			});
		} catch (error) {
			// TokenExpiredError extends JsonWebTokenError
			if (error instanceof jwt.TokenExpiredError) {
				throw new TokenExpiredError(error.expiredAt, { cause: error });
			}
			if (error instanceof jwt.JsonWebTokenError) {
				throw new TokenInvalidError(`Invalid token: ${error.message}`, { cause: error });
			}
			throw error;
		}

		const parsed = TokenClaimsSchema.safeParse(decoded);
		if (!parsed.success) {
			throw new TokenInvalidError("Invalid token: missing or malformed claims");
		}
		return parsed.data;
	}
}

import { Unauthorized } from "../lib/errors.js";
import { ANONYMOUS, type Identity } from "../storage/types.js";

export interface AuthUser {
  id: string;
  email: string | null;
}

export interface AuthSession {
  user: AuthUser;
  /** Null when the provider still waits for e-mail confirmation. */
  session: { accessToken: string; expiresAt: number | null } | null;
}

export interface Authenticator {
  signUp(email: string, password: string): Promise<AuthSession>;
  signIn(email: string, password: string): Promise<AuthSession>;
  /** Resolve an access token to its user; throws Unauthorized when the token is not valid. */
  verify(accessToken: string): Promise<AuthUser>;
}

/** `Bearer <token>` → token, anything else → null. */
export function bearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const m = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return m ? m[1] : null;
}

/** Identity for a request: anonymous without an Authorization header, a verified user otherwise. */
export async function identityFromHeader(auth: Authenticator, header: string | undefined): Promise<Identity> {
  if (!header) return ANONYMOUS;
  const token = bearerToken(header);
  if (!token) throw new Unauthorized("Authorization header must be 'Bearer <token>'");
  const user = await auth.verify(token);
  return { kind: "user", userId: user.id, accessToken: token };
}

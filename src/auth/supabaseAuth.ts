import type { AuthError, Session, SupabaseClient, User } from "@supabase/supabase-js";
import { ProviderError, Unauthorized, ValidationError } from "../lib/errors.js";
import type { AuthSession, AuthUser, Authenticator } from "./authenticator.js";

function toUser(user: User): AuthUser {
  return { id: user.id, email: user.email ?? null };
}

function toSession(user: User, session: Session | null): AuthSession {
  return {
    user: toUser(user),
    session: session ? { accessToken: session.access_token, expiresAt: session.expires_at ?? null } : null,
  };
}

function mapAuthError(error: AuthError, action: string): Error {
  if (error.status === 400 || error.status === 422) return new ValidationError(`${action}: ${error.message}`);
  if (error.status === 401 || error.status === 403) return new Unauthorized(`${action}: ${error.message}`);
  return new ProviderError(`${action}: ${error.message}`, { cause: error });
}

/** Supabase Auth through the anon-key client. */
export function createSupabaseAuthenticator(client: SupabaseClient): Authenticator {
  return {
    async signUp(email, password) {
      const { data, error } = await client.auth.signUp({ email, password });
      if (error) throw mapAuthError(error, "sign up");
      if (!data.user) throw new ProviderError("sign up: no user returned");
      return toSession(data.user, data.session);
    },

    async signIn(email, password) {
      const { data, error } = await client.auth.signInWithPassword({ email, password });
      if (error) {
        // wrong password comes back as 400 invalid_credentials
        if (error.status === 400) throw new Unauthorized(error.message);
        throw mapAuthError(error, "sign in");
      }
      if (!data.user) throw new ProviderError("sign in: no user returned");
      return toSession(data.user, data.session);
    },

    async verify(accessToken) {
      const { data, error } = await client.auth.getUser(accessToken);
      if (error || !data.user) throw new Unauthorized(error ? error.message : "Invalid or expired token");
      return toUser(data.user);
    },
  };
}

/* ================= REUSABLE TYPES ================= */

export type UserSummary = {
  id: number;
  email: string;
};

/** Access + refresh pair as returned by verify-code, login and refresh. */
export type TokenPair = {
  access_token: string;
  refresh_token: string;
  token_type: 'Bearer';
  /** Access token lifetime in seconds. */
  expires_in: number;
};

/* ================= CONCRETE RESPONSES ================= */

/** Returned by POST /auth/signup/send-code and /auth/signup/resend-code. */
export type CodeSentResponse = {
  message: string;
  email: string;
  /** Seconds the pending signup (and its code) stays valid. */
  expires_in: number;
};

export type VerifyCodeResponse = TokenPair & { user: UserSummary };

export type LoginResponse = TokenPair & { message: string; user: UserSummary };

export type RefreshResponse = TokenPair;

export type MessageResponse = { message: string };

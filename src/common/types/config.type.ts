/**
 * AppConfig
 *
 * Single source of truth for every configuration key used in the application.
 * Each field maps 1-to-1 to a key returned by configuration.ts and consumed
 * via ConfigService.get<T>('section.key').
 *
 * Keep in sync with:
 *  - src/config/configuration.ts   (the factory)
 *  - .env.example                  (the env reference)
 */

export type AppConfig = {
  // ─── Application ───────────────────────────────────────────────────────────
  app: {
    /** Human-readable application name. Used in emails and logs. */
    name: string;
    /** HTTP port the server listens on. */
    port: number;
    /** Runtime environment: 'development' | 'staging' | 'production' */
    env: string;
  };

  // ─── Internationalisation ──────────────────────────────────────────────────
  i18n: {
    /** BCP-47 language tag used when no match is found, e.g. 'ja'. */
    defaultLanguage: string;
  };

  // ─── Database ──────────────────────────────────────────────────────────────
  database: {
    /** Full PostgreSQL connection string. */
    url: string;
  };

  // ─── JWT ───────────────────────────────────────────────────────────────────
  jwt: {
    /** HMAC signing secret for access tokens. */
    secret: string;
    /** Access token lifetime in seconds. Default: 900 (15 min). */
    accessTokenTtl: number;
    /** Refresh token lifetime in seconds. Default: 2592000 (30 days). */
    refreshTokenTtl: number;
  };

  // ─── Signup & rate limiting ────────────────────────────────────────────────
  auth: {
    /** Seconds a pending signup (hash + code) survives. Default: 900. */
    signupSessionTtl: number;
    rateLimit: {
      /** Code sends (send-code + resend-code) per email within `windowSeconds`. */
      sendCode: { maxAttempts: number; windowSeconds: number };
      /** Login attempts per email within `windowSeconds`. */
      login: { maxAttempts: number; windowSeconds: number };
    };
  };

  // ─── CORS ──────────────────────────────────────────────────────────────────
  cors: {
    /** Allowed origin(s) for cross-origin requests, comma separated. */
    origin: string;
  };

  // ─── Mail ──────────────────────────────────────────────────────────────────
  mail: {
    /** SMTP host, e.g. 'smtp.resend.com'. */
    host: string;
    /** SMTP port — 465 (SSL) or 587 (STARTTLS). */
    port: number;
    /** SMTP authentication username. */
    user: string;
    /** SMTP authentication password or API key. */
    password: string;
    /** RFC-5321 From address shown to recipients. */
    from: string;
    /** Milliseconds before an SMTP connection or socket is abandoned. */
    timeout: number;
  };

  // ─── Cache ─────────────────────────────────────────────────────────────────
  cache: {
    /** Milliseconds between sweeps of expired in-memory entries. */
    cleanupInterval: number;
    redis: {
      /**
       * Set to true to keep sessions and counters in Redis.
       * When false the in-process store is used (single instance only).
       */
      enabled: boolean;
      /** Full Redis connection URL, e.g. 'redis://localhost:6379'. */
      url: string | null;
      /** Milliseconds before a single Redis command is abandoned. */
      commandTimeout: number;
    };
  };
};

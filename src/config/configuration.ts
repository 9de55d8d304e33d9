import { AppConfig } from '@/common/types/config.type';

const int = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

/**
 * Configuration factory loaded by ConfigModule.forRoot({ load: [configuration] }).
 */
export default (): AppConfig => ({
  // ─── Application ───────────────────────────────────────────────────────────
  app: {
    name: process.env.APP_NAME ?? 'Muzee',
    port: int(process.env.PORT, 8080),
    env: process.env.NODE_ENV ?? 'development',
  },

  // ─── Internationalisation ──────────────────────────────────────────────────
  i18n: {
    defaultLanguage: process.env.FALLBACK_LANGUAGE ?? 'ja',
  },

  // ─── Database ──────────────────────────────────────────────────────────────
  database: {
    url: process.env.DATABASE_URL ?? '',
  },

  // ─── JWT ───────────────────────────────────────────────────────────────────
  jwt: {
    secret: process.env.JWT_SECRET ?? 'muzee-jwt-secret',
    accessTokenTtl: int(process.env.ACCESS_TOKEN_TTL, 15 * 60),
    refreshTokenTtl: int(process.env.REFRESH_TOKEN_TTL, 30 * 24 * 60 * 60),
  },

  // ─── Signup & rate limiting ────────────────────────────────────────────────
  auth: {
    signupSessionTtl: int(process.env.SIGNUP_SESSION_TTL, 15 * 60),
    rateLimit: {
      sendCode: {
        maxAttempts: int(process.env.SEND_CODE_MAX_ATTEMPTS, 3),
        windowSeconds: int(process.env.SEND_CODE_WINDOW, 5 * 60),
      },
      login: {
        maxAttempts: int(process.env.LOGIN_MAX_ATTEMPTS, 5),
        windowSeconds: int(process.env.LOGIN_WINDOW, 15 * 60),
      },
    },
  },

  // ─── CORS ──────────────────────────────────────────────────────────────────
  cors: {
    origin: process.env.CORS_ORIGIN ?? 'http://localhost:3000',
  },

  // ─── Mail ──────────────────────────────────────────────────────────────────
  mail: {
    host: process.env.MAIL_HOST ?? '',
    port: int(process.env.MAIL_PORT, 587),
    user: process.env.MAIL_USER ?? '',
    password: process.env.MAIL_PASSWORD ?? '',
    from:
      process.env.MAIL_FROM ??
      `"${process.env.APP_NAME ?? 'Muzee'}" <no-reply@example.com>`,
    timeout: int(process.env.MAIL_TIMEOUT, 10_000),
  },

  // ─── Cache ─────────────────────────────────────────────────────────────────
  cache: {
    cleanupInterval: int(process.env.CACHE_CLEANUP_INTERVAL, 60_000),
    redis: {
      enabled: process.env.REDIS_ENABLED === 'true',
      url: process.env.REDIS_URL ?? null,
      commandTimeout: int(process.env.REDIS_COMMAND_TIMEOUT, 5000),
    },
  },
});

export const AUTH_CONSTANTS = {
  CODE_LENGTH: 6,
};

export enum RateLimitOperation {
  SEND_CODE = 'send_code',
  LOGIN = 'login',
}

export const CACHE_KEYS = {
  RATE_LIMIT: (operation: RateLimitOperation, identity: string): string =>
    `rate_limit:${operation}:${identity}`,
  SIGNUP_SESSION: (email: string): string => `signup:${email}`,
  REFRESH_TOKEN: (token: string): string => `refresh_token:${token}`,
};

import { AUTH_CONSTANTS } from '@/common/constants/auth.constants';
import { randomInt } from 'crypto';

const drawCode = (): string =>
  randomInt(0, 10 ** AUTH_CONSTANTS.CODE_LENGTH)
    .toString()
    .padStart(AUTH_CONSTANTS.CODE_LENGTH, '0');

/**
 * Uniform 6-digit numeric code, zero padded ("004217"). When `previous` is
 * given the result is guaranteed to differ from it.
 */
export const generateVerificationCode = (previous?: string): string => {
  let code = drawCode();
  while (code === previous) {
    code = drawCode();
  }
  return code;
};

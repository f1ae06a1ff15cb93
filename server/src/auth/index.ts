export { API_KEY_HEADER, apiKeyAuth, type AuthEnv } from './middleware';
export { KeyValidator, type KeyValidatorOptions } from './validator';

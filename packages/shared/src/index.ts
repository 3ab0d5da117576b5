export { createLogger, wrapPino, type SafeLogger } from './logger';
export { AppError, ErrorCode } from './errors';
export {
  loadConfig,
  type BaseConfig,
  type ApiConfig,
  BaseConfigSchema,
  DatabaseConfigSchema,
  JwtConfigSchema,
  ApiConfigSchema,
} from './config';
export { Argon2SecretHasher } from './auth/secret-hasher';
export { JoseTokenService, type TokenService, type TokenServiceConfig } from './auth/token-service';
export { Base64ImageDecoder, DEFAULT_MAX_IMAGE_BYTES, MAX_IMAGE_DIMENSION } from './image-decoder';

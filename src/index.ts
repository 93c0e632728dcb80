/**
 * Public API for magpie-likes
 *
 * This package can be used both as:
 * 1. CLI tool: `magpie fetch --sample`
 * 2. Library: `import { runPipeline, loadConfig } from 'magpie-likes'`
 *
 * @packageDocumentation
 * @module magpie-likes
 */

// ===== Auth =====
export {
	AUTHORIZE_URL,
	AuthorizationState,
	DEFAULT_SCOPES,
	OAuth2PkceClient,
	TOKEN_URL,
	callbackRedirectUri,
	createCsrfToken,
	createPkcePair,
} from './auth/credential-exchange.js'
export type { OAuth2PkceClientConfig, PkcePair } from './auth/credential-exchange.js'
export type { CallbackOutcome } from './auth/callback-outcome.js'
export { decodeCallbackQuery } from './auth/callback-outcome.js'
export {
	CALLBACK_PATH,
	CallbackState,
	catchCallback,
	createCallbackApp,
} from './auth/callback-server.js'
export type { CatchCallbackOptions } from './auth/callback-server.js'
export { login } from './auth/login.js'
export type { LoginOptions } from './auth/login.js'

// ===== API =====
export { DEFAULT_API_BASE_URL, TwitterApiClient } from './api/client.js'
export type {
	FetchLike,
	LikedTweetsOptions,
	LikesApi,
	TwitterApiClientConfig,
} from './api/client.js'

// ===== Feed =====
export { walkLikedTweets } from './feed/feed-walker.js'
export type { WalkOptions } from './feed/feed-walker.js'
export { MetadataEnricher } from './feed/metadata-enricher.js'
export { UsernameCache } from './feed/username-cache.js'

// ===== Download =====
export {
	DEFAULT_DOWNLOAD_CONCURRENCY,
	assertAllDownloaded,
	downloadAll,
} from './download/bounded-downloader.js'
export type {
	DownloadFailureReason,
	DownloadOptions,
	DownloadOutcome,
	DownloadResult,
} from './download/bounded-downloader.js'

// ===== Pipeline =====
export { runPipeline } from './pipeline.js'
export type {
	PageProgress,
	PipelineHooks,
	PipelineOptions,
	PipelineSummary,
} from './pipeline.js'

// ===== Schema =====
export { imageFilename } from './schema/image-reference.js'
export type { ImageReference, ImageSource } from './schema/image-reference.js'
export type {
	LikedTweetsPage,
	Media,
	Tweet,
	User,
} from './schema/twitter.js'

// ===== Config Management =====
export {
	discoverConfigFile,
	loadConfig,
	loadConfigFile,
	mergeConfig,
	substituteEnvVars,
} from './config/loader.js'
export {
	CONFIG_FILE_NAMES,
	detectConfigFormat,
	validateConfig,
	validateConfigSafe,
} from './config/schema.js'
export type { Config, ConfigFormat, PartialConfig } from './config/schema.js'
export { generateConfigFile, renderStarterConfig } from './config/generator.js'

// ===== Errors and utilities =====
export {
	ApiInvariantError,
	AuthIntegrityError,
	AuthorizationDeniedError,
	CallbackTimeoutError,
	DownloadBatchError,
	LocalIOError,
	MagpieError,
	SetupError,
	TokenExchangeError,
	TransportError,
	errorChain,
	isMagpieError,
} from './utils/errors.js'
export type { ErrorKind } from './utils/errors.js'
export { RedactedSecret } from './utils/redacted.js'
export { createLogger } from './utils/logger.js'

export type {
	Outcome,
	HttpRequest,
	EntryKind,
	ResolvedPath,
	ResponseHeaders,
	ResponseBody,
	FileStats,
	DirectoryEntry,
	ReadableFile,
	FileSystem,
} from './types';
export { success, failure } from './types';
export {
	HttpError,
	MalformedRequestError,
	RequestTimeoutError,
	RequestTooLargeError,
	TraversalError,
	NotFoundError,
	MethodNotAllowedError,
	FileSystemError,
	TransportError,
	QueueClosedError,
	ConfigurationError,
} from './errors';
export type { Logger, LogLevel } from './logger';
export { LOG_LEVELS, createConsoleLogger, silentLogger, isLogLevel } from './logger';
export {
	escapeHTML,
	encodeUrlPath,
	serializeResponseHead,
	statusMessage,
	statelessPattern,
	nodeFileSystem,
} from './utils';
export type { ReadRequestError, ReadRequestOptions } from './request-parser';
export { readRequestHead, parseRequestHead, readRequest } from './request-parser';
export type { ResolveError, PathResolverOptions, NormalizedTarget } from './path-resolver';
export { normalizeTarget, PathResolver } from './path-resolver';
export { DEFAULT_CHUNK_SIZE, readFileChunks } from './streams';
export { StreamResponse } from './response';
export type { ListedEntry, RenderError, ResponseWriterOptions } from './response-writer';
export { DEFAULT_MIME_TYPE, contentTypeFromName, ResponseWriter } from './response-writer';
export type { ConnectionState } from './connection';
export { Connection } from './connection';
export type { ConnectionHandlerOptions } from './connection-handler';
export { ALLOWED_METHODS, ConnectionHandler } from './connection-handler';
export { WorkQueue } from './work-queue';
export type { WorkerPoolOptions, WorkerPoolStats } from './worker-pool';
export { DEFAULT_WORKERS, QUEUE_CAPACITY_PER_WORKER, WorkerPool } from './worker-pool';
export type { ServerOptions, ResolvedServerOptions, CommandLine } from './config';
export {
	DEFAULT_PORT,
	DEFAULT_HOST,
	DEFAULT_READ_TIMEOUT_MS,
	DEFAULT_MAX_HEADER_BYTES,
	DEFAULT_LINGER_TIMEOUT_MS,
	DEFAULT_ACCEPT_BACKLOG,
	USAGE,
	resolveServerOptions,
	parseCommandLine,
} from './config';
export type { Job } from './server';
export { FileServer } from './server';

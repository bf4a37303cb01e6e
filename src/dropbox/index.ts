/**
 * Dropbox binding exports
 */

export {
  // Fragment parsing
  parseFragment,
  fragmentFromLocation,
} from './fragment.js';
export type { FragmentMap, LocationLike } from './fragment.js';

export {
  // OAuth implicit grant
  DROPBOX_AUTHORIZE_URL,
  authorizationUrl,
  authorize,
  redirectUriFromLocation,
  parseAuthorizeResponse,
  toUserAuth,
  userAuthFromToken,
  authorizationHeader,
  formatAuthorizationHeader,
  parseAuthorizationRedirect,
} from './authorize.js';
export type {
  AuthorizeRequest,
  AuthorizeResponse,
  AuthorizationRedirect,
  UserAuth,
} from './authorize.js';

export {
  // Request builders
  DROPBOX_API_URL,
  DROPBOX_CONTENT_URL,
  WriteMode,
  encodeWriteMode,
  encodeApiArg,
  encodeUploadArg,
  formatDropboxTimestamp,
  revokeRequest,
  downloadRequest,
  uploadRequest,
} from './requests.js';
export type { HttpRequest, DownloadArg, UploadRequest } from './requests.js';

export {
  // Response decoders
  decodeUploadResponse,
  decodeMediaInfo,
  decodeDownload,
  decodeRevoke,
  preserveIntegers,
} from './responses.js';
export type {
  UploadResponse,
  MediaInfo,
  MediaMetadata,
  PhotoMetadata,
  VideoMetadata,
  Dimensions,
  GpsCoordinates,
  FileSharingInfo,
  PropertyGroup,
  PropertyField,
} from './schema.js';

export {
  // Transport
  fetchTransport,
  checkStatus,
} from './transport.js';
export type { HttpTransport, HttpResponse, FetchLike } from './transport.js';

export {
  // Endpoint calls
  revokeToken,
  downloadFile,
  uploadFile,
  createDropboxClient,
} from './client.js';
export type { DropboxClient, DropboxClientOptions } from './client.js';

export {
  // Redirect orchestration
  withAuthRedirect,
  isNavigatedEvent,
} from './redirect.js';
export type { NavigatedEvent, Transition, Update, AuthRedirectHandlers } from './redirect.js';

export { ok, err, describeError } from './result.js';
export type { Result, AuthError, DecodeError, TransportError, DropboxError } from './result.js';

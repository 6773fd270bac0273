export {
  MirrorError,
  AuthError,
  MissingTokenError,
  NotFoundError,
  NotAFileError,
  RemoteApiError,
  LocalIoError,
  InvalidEntryError,
  ManifestParseError,
  ConfigurationError,
} from './catalog.js'

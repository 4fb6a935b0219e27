export enum ErrorCode {
  AUTH = 'AUTH',
  NOT_FOUND = 'NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  RATE_LIMITED = 'RATE_LIMITED',
  NETWORK = 'NETWORK',
  REMOTE = 'REMOTE',
  VALIDATION = 'VALIDATION',
  IO_ERROR = 'IO_ERROR',
  UNKNOWN = 'UNKNOWN'
}

export enum ErrorStage {
  CONNECT = 'CONNECT',
  LIST = 'LIST',
  UPLOAD = 'UPLOAD',
  DOWNLOAD = 'DOWNLOAD',
  CREATE_FOLDER = 'CREATE_FOLDER',
  DELETE = 'DELETE',
  INFO = 'INFO'
}

export enum BatchKind {
  UPLOAD = 'UPLOAD',
  DOWNLOAD = 'DOWNLOAD',
  DELETE = 'DELETE',
  FOLDER_UPLOAD = 'FOLDER_UPLOAD'
}

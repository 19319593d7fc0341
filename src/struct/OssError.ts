// Types of error in enumerator
export enum ErrorType {
  "INVALID_CONFIG" = "The config is invalid json type",
  "GET_USER_INPUT_FAILED" = "Error occurred while getting user input",
  "MESSAGE_GENERATION_FAILED" = "Error occurred while updating monitor",
  "ROOT_PATH_INVALID" = "The Songs folder does not exist or is not a directory",
  "PARSE_FAILED" = "Error occurred while parsing a chart file",
  "FOLDER_SCAN_FAILED" = "Error occurred while scanning a beatmap folder",
  "CACHE_CORRUPT" = "The index cache is unreadable or incompatible",
  "CACHE_WRITE_FAILED" = "Error occurred while writing the index cache",
  "INVALID_QUERY" = "The query is malformed",
  "UNKNOWN_COMMAND" = "The command is not recognized",
}

export type ErrorTypeKey = keyof typeof ErrorType;

// Returns a string containing the current date, a label, the string value associated with the errorType, and the error itself
const getMessage = (type: ErrorTypeKey, error: string): string => {
  return `${new Date().toLocaleTimeString()} | [OssError]: ${type} - ${
    ErrorType[type]
  }\n${error}`;
};

const describe = (error: unknown): string => {
  if (error instanceof OssError) return error.detail;
  if (error instanceof Error) return error.message;
  return String(error);
};

export default class OssError extends Error {
  readonly type: ErrorTypeKey;
  // The cause without the timestamped header, for short terminal messages
  readonly detail: string;

  constructor(errorType: ErrorTypeKey, error: unknown) {
    const detail = describe(error);
    // Calls the parent class' constructor and sets the message property of the OssError instance
    super(getMessage(errorType, detail));
    this.name = "OssError";
    this.type = errorType;
    this.detail = detail;
  }

  static is(error: unknown, type: ErrorTypeKey): error is OssError {
    return error instanceof OssError && error.type === type;
  }
}

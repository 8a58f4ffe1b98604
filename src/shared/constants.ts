/** Apache-style combined-ish format used when ACCESS_LOG_FORMAT is not set. */
export const DEFAULT_ACCESS_LOG_FORMAT = '%a "%r" %s %b "%{Referer}i" "%{User-Agent}i" %T';

/** Rendered for absent headers, unknown addresses and unregistered custom tags. */
export const PLACEHOLDER = '-';

/** Single-character directive keys understood by the parser. */
export const BUILTIN_KEYS = ['t', 'a', 'r', 'M', 'U', 'Q', 'V', 's', 'b', 'T', 'D'] as const;

/** Characters allowed in `%{NAME}` header, tag and environment names. */
export const TAG_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Request-id header honoured by the default span factory. */
export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Single timestamp type used throughout the application.
 * Always milliseconds since Unix epoch; converted to ISO strings only at the
 * HTTP boundary.
 */
export type Timestamp = number;

/**
 * Web API Type Definitions
 *
 * Node provides global Request/Response, but the BodyInit/HeadersInit
 * aliases are DOM-lib types, so the subset used here is declared locally.
 */

/** Body initializer accepted by the Response helpers */
export type BodyInit = string | Uint8Array | ArrayBuffer | ReadableStream<Uint8Array> | null

/** Headers initializer for Response constructors */
export type HeadersInit = Headers | Record<string, string> | [string, string][]

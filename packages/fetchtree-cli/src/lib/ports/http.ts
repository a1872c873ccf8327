/**
 * Abstraction over the HTTP transport used for downloads.
 * Allows testing the download coordinator without network requests.
 */

/** Result of a metadata-only (HEAD) request */
export interface ResourceMetadata {
  status: number;
  ok: boolean;
  /** Server-reported size in bytes; absent when missing or unparseable */
  contentLength?: number;
}

/** Response of a streaming GET; the body is consumed once */
export interface StreamedResponse {
  status: number;
  statusText: string;
  ok: boolean;
  contentLength?: number;
  body: AsyncIterable<Uint8Array>;
}

export interface HttpClient {
  head(url: string): Promise<ResourceMetadata>;
  get(url: string): Promise<StreamedResponse>;
}

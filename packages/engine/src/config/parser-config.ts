export type DuplicateHeaderPolicy = "overwrite" | "combine";

export interface ParserConfig {
  /** Longest accepted token (method, resource, header name or value, reason). Default: 4096 */
  maxTokenLength: number;
  /** Header lines accepted before the blank line. Default: 256 */
  maxHeaderCount: number;
  /** Largest Content-Length that will be read. Default: 10MB */
  maxBodySize: number;
  /** Bytes read as body when only Transfer-Encoding is present. Default: 4096 */
  transferEncodingWindow: number;
  /** What a repeated header name does to the earlier value. Default: "overwrite" */
  duplicateHeaders: DuplicateHeaderPolicy;
}

export function defaultParserConfig(): ParserConfig {
  return {
    maxTokenLength: 4096,
    maxHeaderCount: 256,
    maxBodySize: 10 * 1024 * 1024,
    transferEncodingWindow: 4096,
    duplicateHeaders: "overwrite",
  };
}

export function resolveParserConfig(
  overrides?: Partial<ParserConfig>,
): ParserConfig {
  const config = defaultParserConfig();
  if (!overrides) return config;
  return {
    maxTokenLength: overrides.maxTokenLength ?? config.maxTokenLength,
    maxHeaderCount: overrides.maxHeaderCount ?? config.maxHeaderCount,
    maxBodySize: overrides.maxBodySize ?? config.maxBodySize,
    transferEncodingWindow:
      overrides.transferEncodingWindow ?? config.transferEncodingWindow,
    duplicateHeaders: overrides.duplicateHeaders ?? config.duplicateHeaders,
  };
}

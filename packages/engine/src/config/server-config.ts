import { defaultParserConfig, type ParserConfig } from "./parser-config.js";

export interface ServerConfig {
  /** Port to listen on. Default: 8080 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Suppress request logging. Default: false */
  quiet: boolean;
  /** Max wait for each byte of a request. Default: 5000ms */
  idleTimeoutMs: number;
  /** Limits applied while parsing each request. */
  parser: ParserConfig;
}

export function defaultConfig(): ServerConfig {
  return {
    port: 8080,
    host: "127.0.0.1",
    quiet: false,
    idleTimeoutMs: 5000,
    parser: defaultParserConfig(),
  };
}

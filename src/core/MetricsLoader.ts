// MetricsLoader fluent builder.
//
// Usage:
//   const pipeline = new MetricsLoader()
//     .endpoint('http://victoria:8428', { timeoutMs: 10_000 })
//     .batchSize(500)
//     .maxRetries(5)
//     .logger(createLogger({ level: 'debug' }))
//     .build();
//
//   const result = await pipeline.run(tabularBatchFromRows(rows));

import type { EscapingMode } from '../encode/lineProtocol.ts';
import type { IngestionConfigInput } from './IngestionConfig.ts';
import type { Transport } from './Transport.ts';
import type { Sleep } from './BatchedWriter.ts';
import type { Logger } from '../util/logger.ts';
import type { PipelineDeps } from './IngestionPipeline.ts';
import { resolveIngestionConfig } from './IngestionConfig.ts';
import { IngestionPipeline } from './IngestionPipeline.ts';
import { ConfigError } from './errors.ts';

export class MetricsLoader {
  private _config: Partial<IngestionConfigInput> = {};
  private _deps: PipelineDeps = {};

  /**
   * Configure the import endpoint base URL; the import path is appended.
   * @param options Optional request timeout and extra headers
   */
  endpoint(url: string, options?: { timeoutMs?: number; headers?: Record<string, string> }): this {
    this._config = {
      ...this._config,
      endpointUrl: url,
      timeoutMs: options?.timeoutMs,
      headers: options?.headers,
    };
    return this;
  }

  /** Points per request (default 1000). */
  batchSize(size: number): this {
    this._config = { ...this._config, batchSize: size };
    return this;
  }

  /** Total attempts per batch before it is marked failed (default 3). */
  maxRetries(n: number): this {
    this._config = { ...this._config, maxRetries: n };
    return this;
  }

  /** Name used for rows without a metric_name (default 'parquet_metric'). */
  defaultMetricName(name: string): this {
    this._config = { ...this._config, defaultMetricName: name };
    return this;
  }

  /**
   * Label value escaping.
   * - 'none' (default): values are written verbatim
   * - 'prometheus': backslash, quote and newline are escaped
   */
  escaping(mode: EscapingMode): this {
    this._config = { ...this._config, escaping: mode };
    return this;
  }

  transport(transport: Transport): this {
    this._deps = { ...this._deps, transport };
    return this;
  }

  sleep(sleep: Sleep): this {
    this._deps = { ...this._deps, sleep };
    return this;
  }

  logger(logger: Logger): this {
    this._deps = { ...this._deps, logger };
    return this;
  }

  /** Build the configured pipeline. Throws ConfigError if endpoint() was not called. */
  build(): IngestionPipeline {
    const { endpointUrl } = this._config;
    if (endpointUrl === undefined) {
      throw new ConfigError('MetricsLoader: endpoint() must be called before build()');
    }
    const config = resolveIngestionConfig({ ...this._config, endpointUrl });
    return new IngestionPipeline(config, this._deps);
  }
}

/**
 * Exporter construction from configuration
 */

import { FileSink, StreamSink, type Sink } from './sink.js';
import { TextExporter } from './text.js';
import type { RenderOptions, ResultExporter } from './types.js';
import { XmlExporter } from './xml.js';

export type ExportFormat = 'text' | 'xml';

export type ExportTarget =
  | { kind: 'console' }
  | { kind: 'file'; path: string }
  | { kind: 'stream'; stream: NodeJS.WritableStream }
  | { kind: 'sink'; sink: Sink };

export interface ExporterOptions {
  format: ExportFormat;
  target: ExportTarget;
  /** Include each test's duration (default false) */
  durations?: boolean;
  /** Colour the result token in text output (default false) */
  color?: boolean;
}

function openSink(target: ExportTarget): Sink {
  switch (target.kind) {
    case 'console':
      return new StreamSink(process.stdout);
    case 'file':
      return new FileSink(target.path);
    case 'stream':
      return new StreamSink(target.stream);
    case 'sink':
      return target.sink;
  }
}

/**
 * Create an exporter. File targets are opened immediately.
 *
 * @throws {SinkError} If the target file cannot be opened
 */
export function createExporter(options: ExporterOptions): ResultExporter {
  const sink = openSink(options.target);
  const render = {
    durations: options.durations ?? false,
    color: options.color ?? false,
  };

  try {
    return buildExporter(options.format, sink, render);
  } catch (error) {
    // Only a file opened here is ours to release
    if (options.target.kind === 'file') sink.close();
    throw error;
  }
}

function buildExporter(format: ExportFormat, sink: Sink, render: RenderOptions): ResultExporter {
  switch (format) {
    case 'text':
      return new TextExporter(sink, render);
    case 'xml':
      return new XmlExporter(sink, render);
  }
}

/**
 * Create an exporter, hand it to `use`, and close it once `use` settles.
 * On success the output is flushed before the result is returned.
 *
 * @example
 * ```ts
 * await withExporter({ format: 'xml', target: { kind: 'file', path: 'results.xml' } }, (exporter) => {
 *   exporter.exportResults(suite.results());
 * });
 * ```
 */
export async function withExporter<R>(
  options: ExporterOptions,
  use: (exporter: ResultExporter) => R | Promise<R>,
): Promise<R> {
  const exporter = createExporter(options);
  let result: R;
  try {
    result = await use(exporter);
  } finally {
    exporter.close();
  }
  await exporter.flush();
  return result;
}

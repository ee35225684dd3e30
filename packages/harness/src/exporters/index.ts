export {
  createExporter,
  withExporter,
  type ExporterOptions,
  type ExportFormat,
  type ExportTarget,
} from './factory.js';
export { escapeXml, formatSeconds } from './format.js';
export { FileSink, MemorySink, StreamSink, type Sink } from './sink.js';
export { FAILED_TOKEN, formatTextLine, PASSED_TOKEN, TextExporter } from './text.js';
export type { RenderOptions, ResultExporter } from './types.js';
export { formatTestElement, XmlExporter } from './xml.js';

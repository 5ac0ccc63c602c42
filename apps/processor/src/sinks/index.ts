import type { SinkConfig } from '@beacon/core';
import type { ExportSink } from '../export-dispatcher';
import { ConsoleSink } from './console-sink';
import { FileSink } from './file-sink';
import { HttpSink } from './http-sink';

export function createSink(config: SinkConfig): ExportSink {
  switch (config.type) {
    case 'console':
      return new ConsoleSink();
    case 'file':
      return new FileSink(config.path);
    case 'http':
      return new HttpSink({ url: config.url, headers: config.headers });
  }
}

export { ConsoleSink, FileSink, HttpSink };
export { toJsonLines } from './json-lines';
export type { HttpSinkConfig } from './http-sink';
export type { LineWriter } from './console-sink';

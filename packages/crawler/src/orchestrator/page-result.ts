import type { PageErrorKind } from '../errors/crawl-errors.js';
import type { DocumentKind, PageResult } from './types.js';

export function successResult(params: {
  url: string;
  depth: number;
  content: string;
  documentKind: DocumentKind | null;
  savedPath: string;
  byteLength: number;
}): PageResult {
  return Object.freeze({
    ...params,
    success: true,
    errorKind: null,
    errorMessage: null,
  });
}

export function failureResult(params: {
  url: string;
  depth: number;
  errorKind: PageErrorKind;
  errorMessage: string;
}): PageResult {
  return Object.freeze({
    ...params,
    success: false,
    content: null,
    documentKind: null,
    savedPath: null,
    byteLength: 0,
  });
}

import type { ClientOperation } from '../types.js';
import {
  getAbortedOperation,
  getHeadersOperation,
  getOperation,
  getParametersOperation,
  headOperation,
} from './get.js';
import { postOperation, putOperation } from './upload.js';

export const defaultOperations: readonly ClientOperation[] = [
  getOperation,
  getParametersOperation,
  getHeadersOperation,
  postOperation,
  putOperation,
  headOperation,
  getAbortedOperation,
];

/** Exact, case-insensitive name match, in the order the names were given. */
export function getOperationsByName(names: string[]): ClientOperation[] {
  const selected: ClientOperation[] = [];
  for (const name of names) {
    const match = defaultOperations.find(op => op.name.toLowerCase() === name.trim().toLowerCase());
    if (match && !selected.includes(match)) selected.push(match);
  }
  return selected;
}

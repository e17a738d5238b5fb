import type { PathIdentifier } from '../value-objects/PathIdentifier.js';

export interface StoredPath {
  label: string;
  id: PathIdentifier;
  createdAt: number;
}

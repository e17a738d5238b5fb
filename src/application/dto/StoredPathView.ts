export interface StoredPathView {
  label: string;
  path: string;
  rational: string;
  createdAt: string;
}

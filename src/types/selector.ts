export type SelectorSegment =
  | { readonly kind: 'key'; readonly key: string }
  | { readonly kind: 'index'; readonly index: number }
  | { readonly kind: 'wildcard' }
  | { readonly kind: 'recursive' };

export interface Selector {
  /** Text the selector was compiled from. */
  readonly source: string;
  readonly segments: readonly SelectorSegment[];
}

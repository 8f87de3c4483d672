/**
 * Tag records produced by the parser.
 */

export type TagKind = 'single' | 'container' | 'namespaced';

interface TagBase {
  action: string;
  params: readonly string[];
  attributes: Readonly<Record<string, string>>;
  /** Exact source substring the tag was parsed from. */
  raw: string;
  /** Offset of the first character of `raw` in the source. */
  start: number;
  /** Offset one past the last character of `raw`. */
  end: number;
}

/** `[action /]` */
export interface SingleTag extends TagBase {
  kind: 'single';
}

/** `[tag]content[/tag]` */
export interface ContainerTag extends TagBase {
  kind: 'container';
  content: string;
}

/** `[namespace:action positional key="value" /]` */
export interface NamespacedTag extends TagBase {
  kind: 'namespaced';
  namespace: string;
}

export type Tag = SingleTag | ContainerTag | NamespacedTag;

export interface ParseOptions {
  /** Also report tags found inside containers (default false). */
  includeNested?: boolean;
}

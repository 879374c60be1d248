/**
 * Any value that can be substituted into a message template
 */
export type Displayable =
  | string
  | number
  | bigint
  | boolean
  | symbol
  | null
  | undefined
  | object;

/**
 * Argument tuple demanded by a literal template: one `Displayable` per automatic
 * field (`{}` or `{:spec}`), `{{` skipped. Manual indices (`{0}`) and
 * non-literal templates fall back to `Displayable[]`, checked when rendered.
 */
type AutomaticFields<T extends string, Acc extends Displayable[] = []> =
  T extends `${string}{${infer Tail}`
    ? Tail extends `{${infer After}`
      ? AutomaticFields<After, Acc>
      : Tail extends `}${infer After}`
        ? AutomaticFields<After, [...Acc, Displayable]>
        : Tail extends `:${string}}${infer After}`
          ? AutomaticFields<After, [...Acc, Displayable]>
          : Displayable[]
    : Acc;

export type FormatArgs<T extends string> = string extends T
  ? Displayable[]
  : Extract<AutomaticFields<T>, Displayable[]>;

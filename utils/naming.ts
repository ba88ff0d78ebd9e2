export type Namer = (name: string) => string

export const nm =
  (prefix: string): Namer =>
  (name) =>
    `${prefix}-${name}`

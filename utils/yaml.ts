import { stringify, type ToStringOptions } from 'yaml'

export type YamlOptions = Pick<ToStringOptions, 'indent' | 'lineWidth'>

// lineWidth 0 keeps long scalars, such as certificate data, on a single line
export const objectToYaml = (
  obj: Record<string, NonNullable<unknown>> | unknown[],
  { indent = 2, lineWidth = 0 }: YamlOptions = {},
): string => stringify(obj, { indent, lineWidth })

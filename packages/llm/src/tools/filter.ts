import type { ToolDescriptor } from '../types/index.js';
import type { ToolFilter } from './types.js';

export function toolsByName(
  tools: ReadonlyArray<ToolDescriptor>,
  names: ReadonlyArray<string>,
): Array<ToolDescriptor> {
  const wanted = new Set(names);
  return tools.filter((tool) => wanted.has(tool.name));
}

export function excludeTools(
  tools: ReadonlyArray<ToolDescriptor>,
  names: ReadonlyArray<string>,
): Array<ToolDescriptor> {
  const unwanted = new Set(names);
  return tools.filter((tool) => !unwanted.has(tool.name));
}

export function applyToolFilter(
  tools: ReadonlyArray<ToolDescriptor>,
  filter: ToolFilter | undefined,
): Array<ToolDescriptor> {
  let result = Array.from(tools);
  if (filter?.include) {
    result = toolsByName(result, filter.include);
  }
  if (filter?.exclude) {
    result = excludeTools(result, filter.exclude);
  }
  return result;
}

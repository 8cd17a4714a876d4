export function collect<T>(it: Iterator<T>): T[] {
  let values: T[] = [];
  let result;
  do {
    result = it.next();
    if (result.done == false) {
      values.push(result.value);
    }
  } while (result.done == false);
  return values;
}

/**
 * Get the last item of an array without removing it.
 */
export function peek<T>(items: readonly T[]): T | undefined {
  return items[items.length - 1];
}

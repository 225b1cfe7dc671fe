/**
 * True when `packageName` can be resolved from this module, without loading it.
 */
export function isPackageAvailable(packageName: string): boolean {
  try {
    require.resolve(packageName);
    return true;
  } catch {
    return false;
  }
}

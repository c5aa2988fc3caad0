/**
 * Console logging helpers. Lines carry a [Component] prefix.
 */

/** Debug line, printed only in verbose runs */
export function logDebug(verbose: boolean, message: string): void {
  if (verbose) console.log(message);
}

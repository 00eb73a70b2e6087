/**
 * PAM locator for SpCas9-style NGG motifs.
 *
 * The first PAM base is a wildcard, so a site is any offset whose next two
 * bases are GG. Input is expected upper-cased already.
 */

export const PAM_LENGTH = 3;
const PAM_CORE = "GG";

export function findPamSites(sequence: string): number[] {
  const sites: number[] = [];

  for (let i = 0; i < sequence.length - 2; i++) {
    if (sequence.slice(i + 1, i + PAM_LENGTH) === PAM_CORE) {
      sites.push(i);
    }
  }

  return sites;
}

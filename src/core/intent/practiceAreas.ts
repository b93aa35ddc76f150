/**
 * Practice areas offered by the firm, keyed by the short name users type.
 * Key order matters: area lookups take the first key found in the message.
 */
export const PRACTICE_AREAS: Readonly<Record<string, string>> = Object.freeze({
  corporate: 'Corporate and Commercial Law — entity formation, contracts, M&A, governance.',
  litigation: 'Civil and Commercial Litigation — disputes, arbitration, and mediation.',
  ip: 'Intellectual Property — trademarks, copyrights, licensing, brand protection.',
  employment: 'Employment Law — policies, compliance, investigations, disputes.',
  'real estate': 'Real Estate — transactions, leases, development, and financing.',
});

export const PRACTICE_AREA_KEYS: readonly string[] = Object.freeze(Object.keys(PRACTICE_AREAS));

/** "real estate" -> "Real Estate", "ip" -> "Ip" */
export function titleCase(value: string): string {
  return value
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Finds the area a message asks about. `text` must already be lowercased.
 * "ip" also matches on "intellectual".
 */
export function findPracticeArea(text: string): string | undefined {
  return PRACTICE_AREA_KEYS.find(
    (key) => text.includes(key) || (key === 'ip' && (text.includes('ip') || text.includes('intellectual')))
  );
}

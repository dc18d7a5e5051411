export interface HeadingRules {
  /** Regex sources; a text line matching one becomes the current main heading. */
  main?: string[];
  sub?: string[];
  sub2?: string[];
}

/**
 * Constants and heading rules applied to every record of a document matched
 * to a known vendor.
 */
export interface BrandProfile {
  key: string;
  brandName: string;
  /** Case-insensitive substrings of the file name that select this profile. */
  match: string[];
  /** Label written to `sourceFile`; the document file name when omitted. */
  sourceLabel?: string;
  recordCode: string;
  defaultCurrency: string;
  headingRules: HeadingRules;
  /** Extra instructions appended to the model prompt for this vendor. */
  promptHint?: string;
}

export interface ResolvedProfile {
  profile: BrandProfile;
  /** False when the default profile was used. */
  matched: boolean;
}

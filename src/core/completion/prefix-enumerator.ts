/**
 * What the completion resolver may ask about the software tree and the
 * settings. Everything is read-only.
 */
export interface PrefixEnumerator {
  /** Known platform identifiers */
  platforms(): Promise<string[]>;
  installedPackages(platform: string): Promise<string[]>;
  installedVersions(platform: string, packageName: string): Promise<string[]>;
  /** Package names defined in the settings */
  installablePackages(): Promise<string[]>;
  installableVersions(platform: string, packageName: string): Promise<string[]>;
  /** Values offered for the word following `flag` */
  flagValues(flag: string, platform?: string): Promise<string[]>;
  /** Platform used when the line names none */
  defaultPlatform(): Promise<string | undefined>;
}

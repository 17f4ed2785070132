export const BRAND_NAME = "album-import-pipeline";

const BRAND_RUNTIME_VERSION = process.env.npm_package_version || "1.0.0";
export const BRAND_VERSION = BRAND_RUNTIME_VERSION;

/**
 * MusicBrainz requires every client to identify itself with an application
 * name, version and contact address.
 */
export function buildMusicBrainzUserAgent(
    appName: string,
    version: string,
    contact: string
): string {
    return `${appName}/${version} ( ${contact} )`;
}

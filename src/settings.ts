/**
 * Name under which the platform is registered; must match `platform` in config.json.
 */
export const PLATFORM_NAME = 'CloudHome';

/**
 * Must match the `name` in package.json.
 */
export const PLUGIN_NAME = 'homebridge-cloudhome-sync';

import type { API } from 'homebridge';

import { CloudHomePlatform } from './platform.js';
import { PLATFORM_NAME } from './settings.js';

/**
 * Homebridge entry point.
 * Registers the CloudHomePlatform with Homebridge under PLATFORM_NAME.
 */
export default (api: API) => {
	api.registerPlatform(PLATFORM_NAME, CloudHomePlatform);
};

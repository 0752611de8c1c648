import type { API } from 'homebridge';

import { UnifiInsightsPlatform } from './platform.js';
import { PLATFORM_NAME } from './settings.js';

/**
 * Plugin entry: Homebridge calls this once and the platform does the rest.
 */
export default (api: API) => {
	api.registerPlatform(PLATFORM_NAME, UnifiInsightsPlatform);
};

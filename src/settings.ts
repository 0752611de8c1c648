// src/settings.ts

/** Name the platform is registered under; matches `platform` in config.json. */
export const PLATFORM_NAME = 'UnifiInsights';

/** Must match the `name` field in package.json. */
export const PLUGIN_NAME = 'homebridge-unifi-insights';

// src/unifi/device-catalog.ts

export interface UnifiDeviceModel {
	/** Model code as reported in the device listing (`model`). */
	model: string;

	/** Name shown in the UniFi app; what HomeKit shows as Model. */
	modelName: string;
}

/**
 * Friendly names for model codes the listing reports in short form.
 * Extend this as you meet more hardware; unknown codes fall back to the raw value.
 */
export const DEVICE_CATALOG: Record<string, UnifiDeviceModel> = {
	UDMPRO: {
		model: 'UDMPRO',
		modelName: 'Dream Machine Pro',
	},
	UDMPROSE: {
		model: 'UDMPROSE',
		modelName: 'Dream Machine Special Edition',
	},
	UCGULTRA: {
		model: 'UCGULTRA',
		modelName: 'Cloud Gateway Ultra',
	},
	U6LR: {
		model: 'U6LR',
		modelName: 'U6 Long-Range',
	},
	U6PRO: {
		model: 'U6PRO',
		modelName: 'U6 Pro',
	},
	U7PRO: {
		model: 'U7PRO',
		modelName: 'U7 Pro',
	},
	USWLITE8PoE: {
		model: 'USWLITE8PoE',
		modelName: 'Switch Lite 8 PoE',
	},
	USW24P250: {
		model: 'USW24P250',
		modelName: 'Switch 24 PoE',
	},
};

export function lookupDeviceModel(model: string): UnifiDeviceModel | undefined {
	return DEVICE_CATALOG[model];
}

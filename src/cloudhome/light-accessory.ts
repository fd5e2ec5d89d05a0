// src/cloudhome/light-accessory.ts
import type { CharacteristicValue, PlatformAccessory } from 'homebridge';

import type { AccessoryEnv, AccessoryUpdater, DeviceOfClass } from './accessory-helpers.js';
import {
	applyAccessoryInformation,
	clampNumber,
	kelvinToMired,
	miredToKelvin,
	readView,
	removeStaleServices,
	sendCommand,
} from './accessory-helpers.js';
import { hasCapability } from './types.js';
import type { DeviceView } from './types.js';

// HomeKit uses mireds. Typical tunable-white range is ~153–500 mired (~6500K–2000K).
const CT_MIN_MIRED = 153;
const CT_MAX_MIRED = 500;
const DEFAULT_KELVIN = 3800;

function brightnessOf(view: DeviceView): number {
	return clampNumber(view.values.brightness ?? 0, 0, 100);
}

function miredOf(view: DeviceView): number {
	return clampNumber(kelvinToMired(view.values.color_temperature ?? DEFAULT_KELVIN), CT_MIN_MIRED, CT_MAX_MIRED);
}

export function configureLightAccessory(
	env: AccessoryEnv,
	accessory: PlatformAccessory,
	device: DeviceOfClass<'light'>,
): AccessoryUpdater {
	const { Service, Characteristic, Categories } = env.api.hap;

	removeStaleServices(env, accessory, Service.Lightbulb);

	const service =
		accessory.getService(Service.Lightbulb) ||
		accessory.addService(Service.Lightbulb, device.name);

	if (accessory.category !== Categories.LIGHTBULB) {
		accessory.category = Categories.LIGHTBULB;
	}

	applyAccessoryInformation(env.api, accessory, device);

	// ----- On/Off -----
	service
		.getCharacteristic(Characteristic.On)
		.onGet(() => readView(env, device.id).values.on_off ?? false)
		.onSet(async (value: CharacteristicValue) => {
			await sendCommand(env, device, { on_off: value === true || value === 1 }, 'Light On');
		});

	// ----- Brightness -----
	if (hasCapability(device, 'brightness')) {
		service
			.getCharacteristic(Characteristic.Brightness)
			.onGet(() => brightnessOf(readView(env, device.id)))
			.onSet(async (value: CharacteristicValue) => {
				const brightness = clampNumber(Math.round(Number(value)), 0, 100);
				await sendCommand(env, device, { brightness }, 'Light Brightness');
			});
	} else if (service.testCharacteristic(Characteristic.Brightness)) {
		service.removeCharacteristic(service.getCharacteristic(Characteristic.Brightness));
	}

	// ----- Color Temperature -----
	if (hasCapability(device, 'color_temperature')) {
		service
			.getCharacteristic(Characteristic.ColorTemperature)
			.setProps({
				minValue: CT_MIN_MIRED,
				maxValue: CT_MAX_MIRED,
				minStep: 1,
			})
			.onGet(() => miredOf(readView(env, device.id)))
			.onSet(async (value: CharacteristicValue) => {
				const mired = Number(value);
				if (!Number.isFinite(mired)) {
					env.log.warn('Light ColorTemperature.set received invalid value=%o for %s', value, device.name);
					return;
				}
				await sendCommand(env, device, { color_temperature: miredToKelvin(mired) }, 'Light ColorTemperature');
			});
	} else if (service.testCharacteristic(Characteristic.ColorTemperature)) {
		service.removeCharacteristic(service.getCharacteristic(Characteristic.ColorTemperature));
	}

	return (view) => {
		if (!view.online) {
			service.updateCharacteristic(Characteristic.On, new env.api.hap.HapStatusError(
				env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE,
			));
			return;
		}
		service.updateCharacteristic(Characteristic.On, view.values.on_off ?? false);
		if (hasCapability(device, 'brightness')) {
			service.updateCharacteristic(Characteristic.Brightness, brightnessOf(view));
		}
		if (hasCapability(device, 'color_temperature')) {
			service.updateCharacteristic(Characteristic.ColorTemperature, miredOf(view));
		}
	};
}

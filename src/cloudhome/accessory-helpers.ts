// src/cloudhome/accessory-helpers.ts
import type {
	API,
	HapStatusError,
	PlatformAccessory,
	Service,
	WithUUID,
} from 'homebridge';

import { describeError } from './errors.js';
import type {
	Device,
	DeviceClass,
	DeviceView,
	HomeLogger,
	StateSnapshot,
	StateValues,
} from './types.js';

/** What accessories need from the sync engine. */
export interface DeviceController {
	getDevice(deviceId: string): DeviceView | undefined;
	submitCommand(deviceId: string, changes: StateValues): Promise<StateSnapshot>;
}

// Minimal runtime "env" that accessory modules need from the platform
export interface AccessoryEnv {
	log: HomeLogger;
	api: API;
	controller: DeviceController;
	coverSnapToEnds: boolean;
}

/** Pushes a registry view into the accessory's characteristics. */
export type AccessoryUpdater = (view: DeviceView) => void;

export type DeviceOfClass<C extends DeviceClass> = Extract<Device, { deviceClass: C }>;

export function clampNumber(n: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, n));
}

/**
 * Color Temperature Converters: Convert HomeKit mired values to Kelvin
 */
export function miredToKelvin(mired: number): number {
	const m = clampNumber(Number(mired), 1, 1_000_000);
	return Math.round(1_000_000 / m);
}

/**
 * Color Temperature Converters: Convert Kelvin to HomeKit mired values
 */
export function kelvinToMired(kelvin: number): number {
	const k = clampNumber(Number(kelvin), 1, 1_000_000);
	return Math.round(1_000_000 / k);
}

export function communicationFailure(api: API): HapStatusError {
	return new api.hap.HapStatusError(api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
}

/**
 * Current registry view for a getter. Offline or vanished devices surface as
 * "No Response".
 */
export function readView(env: AccessoryEnv, deviceId: string): DeviceView {
	const view = env.controller.getDevice(deviceId);
	if (!view || !view.online) {
		throw communicationFailure(env.api);
	}
	return view;
}

export async function sendCommand(
	env: AccessoryEnv,
	device: Device,
	changes: StateValues,
	label: string,
): Promise<void> {
	env.log.info('%s.set -> %o for %s (deviceId=%s)', label, changes, device.name, device.id);

	try {
		await env.controller.submitCommand(device.id, changes);
	} catch (err) {
		env.log.warn(
			'%s.set failed for %s (deviceId=%s): %s',
			label,
			device.name,
			device.id,
			describeError(err),
		);
		throw communicationFailure(env.api);
	}
}

/**
 * An accessory keeps its UUID when its device changes class, so drop the
 * primary services that belong to other classes.
 */
export function removeStaleServices(
	env: AccessoryEnv,
	accessory: PlatformAccessory,
	keep: WithUUID<typeof Service>,
	keepSubtype?: string,
): void {
	const { Service: S } = env.api.hap;
	const managed: WithUUID<typeof Service>[] = [S.Lightbulb, S.Switch, S.Fanv2, S.WindowCovering];

	for (const serviceType of managed) {
		const existing = accessory.getService(serviceType);
		if (!existing) {
			continue;
		}
		if (serviceType.UUID === keep.UUID && existing.subtype === keepSubtype) {
			continue;
		}
		env.log.info(
			'Removing stale %s service from %s before reconfiguring',
			existing.displayName,
			accessory.displayName,
		);
		accessory.removeService(existing);
	}
}

/**
 * Populate the standard Accessory Information service from device metadata.
 */
export function applyAccessoryInformation(api: API, accessory: PlatformAccessory, device: Device): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;
	const { info } = device;

	infoService.updateCharacteristic(Characteristic.Name, device.name || accessory.displayName);
	infoService.updateCharacteristic(Characteristic.Manufacturer, info.manufacturer?.trim() || 'Cloud Home');
	infoService.updateCharacteristic(
		Characteristic.Model,
		info.model?.trim() || `${device.deviceClass} (${device.capabilities.join(', ')})`,
	);
	infoService.updateCharacteristic(Characteristic.SerialNumber, device.id);

	const firmware = info.firmwareRevision?.trim();
	if (firmware) {
		infoService.updateCharacteristic(Characteristic.FirmwareRevision, firmware);
		infoService.updateCharacteristic(Characteristic.SoftwareRevision, firmware);
	}
	const hardware = info.hardwareRevision?.trim();
	if (hardware) {
		infoService.updateCharacteristic(Characteristic.HardwareRevision, hardware);
	}
}

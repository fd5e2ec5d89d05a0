// src/cloudhome/command-serializer.ts
//
// Per-device FIFO with at most one command in flight per device. Devices do
// not wait on each other.

import { ExecuteError, describeError } from './errors.js';
import type { DeviceProtocol } from './protocol-client.js';
import type { Reconciler } from './reconciler.js';
import { createConsoleLogger } from './types.js';
import type { Command, HomeLogger, StateSnapshot } from './types.js';

interface QueuedCommand {
	command: Command;
	resolve: (snapshot: StateSnapshot) => void;
	reject: (err: ExecuteError) => void;
}

interface DeviceQueue {
	inFlight: QueuedCommand | null;
	waiting: QueuedCommand[];
}

export interface CommandSerializerOptions {
	protocol: Pick<DeviceProtocol, 'execute'>;
	reconciler: Reconciler;
	/** Runs right before a command leaves the queue, e.g. to refresh stale state. */
	beforeDispatch?: (command: Command) => Promise<void>;
	logger?: HomeLogger;
}

export class CommandSerializer {
	private readonly log: HomeLogger;
	private readonly queues = new Map<string, DeviceQueue>();
	private closed = false;

	public constructor(private readonly options: CommandSerializerOptions) {
		this.log = options.logger ?? createConsoleLogger('cloudhome-commands');
	}

	/**
	 * Queue a command. Resolves with the authoritative state once the service
	 * confirms it; rejects with an ExecuteError after the optimistic values
	 * have been rolled back.
	 */
	public submit(command: Command): Promise<StateSnapshot> {
		if (this.closed) {
			return Promise.reject(new ExecuteError('session-closed', 'session is closed'));
		}

		return new Promise<StateSnapshot>((resolve, reject) => {
			let queue = this.queues.get(command.deviceId);
			if (!queue) {
				queue = { inFlight: null, waiting: [] };
				this.queues.set(command.deviceId, queue);
			}
			queue.waiting.push({ command, resolve, reject });
			this.log.debug(
				'Commands: queued %s for %s (%d waiting).',
				command.token,
				command.deviceId,
				queue.waiting.length,
			);
			this.pump(command.deviceId);
		});
	}

	/** Commands queued or in flight for a device. */
	public depth(deviceId: string): number {
		const queue = this.queues.get(deviceId);
		if (!queue) {
			return 0;
		}
		return queue.waiting.length + (queue.inFlight ? 1 : 0);
	}

	public isBusy(deviceId: string): boolean {
		return Boolean(this.queues.get(deviceId)?.inFlight);
	}

	/**
	 * Reject everything with session-closed. In-flight commands are rolled
	 * back; their late results are ignored.
	 */
	public close(): void {
		if (this.closed) {
			return;
		}
		this.closed = true;

		for (const [deviceId, queue] of this.queues) {
			const inFlight = queue.inFlight;
			if (inFlight) {
				this.options.reconciler.rollbackCommand(inFlight.command);
				inFlight.reject(new ExecuteError('session-closed', `session closed while ${inFlight.command.token} was in flight`));
			}
			for (const queued of queue.waiting) {
				queued.reject(new ExecuteError('session-closed', `session closed before ${queued.command.token} was sent`));
			}
			this.log.debug('Commands: cancelled %d command(s) for %s.', queue.waiting.length + (inFlight ? 1 : 0), deviceId);
		}
		this.queues.clear();
	}

	private pump(deviceId: string): void {
		const queue = this.queues.get(deviceId);
		if (!queue || queue.inFlight || this.closed) {
			return;
		}

		const next = queue.waiting.shift();
		if (!next) {
			this.queues.delete(deviceId);
			return;
		}

		queue.inFlight = next;
		this.run(queue, next)
			.catch((err: unknown) => {
				this.log.error('Commands: unexpected failure running %s: %s', next.command.token, describeError(err));
			})
			.finally(() => {
				if (queue.inFlight === next) {
					queue.inFlight = null;
				}
				this.pump(deviceId);
			});
	}

	private async run(queue: DeviceQueue, queued: QueuedCommand): Promise<void> {
		const { command } = queued;
		const { reconciler, protocol, beforeDispatch } = this.options;

		if (beforeDispatch) {
			try {
				await beforeDispatch(command);
			} catch (err) {
				this.log.warn('Commands: pre-dispatch refresh for %s failed: %s', command.deviceId, describeError(err));
			}
		}

		// close() already settled this one.
		if (queue.inFlight !== queued || this.closed) {
			return;
		}

		reconciler.applyOptimistic(command);

		let snapshot: StateSnapshot;
		try {
			snapshot = await protocol.execute(command);
		} catch (err) {
			if (queue.inFlight !== queued || this.closed) {
				return;
			}
			const failure = err instanceof ExecuteError
				? err
				: new ExecuteError('rejected', describeError(err), { cause: err });

			if (failure.reason === 'partial-failure' && failure.state) {
				// Accepted capabilities keep the service's values; rejected ones revert.
				reconciler.confirmCommand(command, failure.state);
			} else {
				reconciler.rollbackCommand(command);
				if (failure.reason === 'device-offline') {
					reconciler.markOffline(command.deviceId, command.issuedAt);
				}
			}

			this.log.warn('Commands: %s for %s failed (%s): %s', command.token, command.deviceId, failure.reason, failure.message);
			queued.reject(failure);
			return;
		}

		if (queue.inFlight !== queued || this.closed) {
			return;
		}

		reconciler.confirmCommand(command, snapshot);
		this.log.debug('Commands: %s for %s confirmed.', command.token, command.deviceId);
		queued.resolve(snapshot);
	}
}

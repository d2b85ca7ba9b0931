// src/yeelight/lan-client.ts

import net from 'net';

import type { DeviceLogger } from '../device/logger.js';
import { createConsoleLogger } from '../device/logger.js';
import { TransportError, describeError } from './errors.js';

export const DEFAULT_LAN_PORT = 55443;
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export type CommandParam = string | number;

export interface LanClientOptions {
	host: string;
	port?: number;
	requestTimeoutMs?: number;
	logger?: DeviceLogger;
}

interface PendingRequest {
	method: string;
	resolve(result: unknown[]): void;
	reject(err: TransportError): void;
	timer: NodeJS.Timeout;
}

type ReplyFrame = {
	id?: unknown;
	result?: unknown;
	error?: { code?: number; message?: string };
	method?: unknown;
	params?: unknown;
};

/**
 * Line-delimited JSON control channel to one bulb.
 *
 * Requests carry an incrementing id and are matched to replies by that id.
 * The socket is opened lazily and reopened on demand after it closes.
 */
export class LanClient {
	private readonly host: string;
	private readonly port: number;
	private readonly requestTimeoutMs: number;
	private readonly log: DeviceLogger;

	private socket: net.Socket | null = null;
	private connecting: Promise<net.Socket> | null = null;
	private readBuffer = '';
	private seq = 0;
	private closed = false;
	private readonly pending = new Map<number, PendingRequest>();

	constructor(options: LanClientOptions) {
		this.host = options.host;
		this.port = options.port ?? DEFAULT_LAN_PORT;
		this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
		this.log = options.logger ?? createConsoleLogger('yeelight-lan');
	}

	public get address(): string {
		return `${this.host}:${this.port}`;
	}

	/**
	 * Send one command and wait for its reply. Resolves with the `result`
	 * array; rejects with a TransportError for anything else.
	 */
	public async invoke(method: string, params: CommandParam[] = []): Promise<unknown[]> {
		if (this.closed) {
			throw new TransportError('closed', `${method} to ${this.address} after the client was closed`);
		}
		const socket = await this.ensureConnected();
		if (this.closed) {
			throw new TransportError('closed', `connection to ${this.address} closed`);
		}
		const id = this.nextSeq();

		return new Promise<unknown[]>((resolve, reject) => {
			const timer = setTimeout(() => {
				this.pending.delete(id);
				reject(new TransportError(
					'timeout',
					`${method} to ${this.address} timed out after ${this.requestTimeoutMs}ms`,
				));
			}, this.requestTimeoutMs);

			this.pending.set(id, { method, resolve, reject, timer });

			const line = JSON.stringify({ id, method, params }) + '\r\n';
			this.log.debug('[Yeelight LAN] -> %s %s', this.address, line.trim());
			socket.write(line);
		});
	}

	/** Permanent: later invoke() calls reject and a connect in flight is dropped. */
	public close(): void {
		this.closed = true;
		if (this.socket) {
			this.socket.destroy();
			this.socket = null;
		}
		this.failPending(new TransportError('closed', `connection to ${this.address} closed`));
	}

	private nextSeq(): number {
		if (this.seq >= 0x7fffffff) {
			this.seq = 1;
		} else {
			this.seq++;
		}
		return this.seq;
	}

	private async ensureConnected(): Promise<net.Socket> {
		if (this.socket && !this.socket.destroyed) {
			return this.socket;
		}
		if (!this.connecting) {
			this.connecting = this.openSocket().finally(() => {
				this.connecting = null;
			});
		}
		return this.connecting;
	}

	private openSocket(): Promise<net.Socket> {
		this.log.debug('[Yeelight LAN] Connecting to %s…', this.address);

		return new Promise((resolve, reject) => {
			const sock = net.createConnection({ host: this.host, port: this.port });

			const onConnectError = (err: Error) => {
				sock.destroy();
				reject(new TransportError(
					'connect',
					`cannot connect to ${this.address}: ${describeError(err)}`,
					{ cause: err },
				));
			};

			sock.once('error', onConnectError);
			sock.setTimeout(this.requestTimeoutMs, () => {
				sock.destroy(new Error('connect timeout'));
			});
			sock.once('connect', () => {
				sock.removeListener('error', onConnectError);
				sock.setTimeout(0);
				if (this.closed) {
					sock.destroy();
					reject(new TransportError('closed', `connection to ${this.address} closed`));
					return;
				}
				this.socket = sock;
				this.readBuffer = '';
				this.attachSocketListeners(sock);
				resolve(sock);
			});
		});
	}

	private attachSocketListeners(socket: net.Socket): void {
		socket.setEncoding('utf8');

		socket.on('data', (chunk: string) => {
			this.readBuffer += chunk;
			this.processIncoming();
		});

		socket.on('close', () => {
			this.log.debug('[Yeelight LAN] Socket to %s closed.', this.address);
			if (this.socket === socket) {
				this.socket = null;
			}
			this.failPending(new TransportError('closed', `connection to ${this.address} closed`));
		});

		socket.on('error', (err) => {
			this.log.warn('[Yeelight LAN] Socket error on %s: %s', this.address, describeError(err));
		});
	}

	private processIncoming(): void {
		let newline = this.readBuffer.indexOf('\n');
		while (newline !== -1) {
			const line = this.readBuffer.slice(0, newline).trim();
			this.readBuffer = this.readBuffer.slice(newline + 1);
			if (line.length > 0) {
				this.handleLine(line);
			}
			newline = this.readBuffer.indexOf('\n');
		}
	}

	private handleLine(line: string): void {
		this.log.debug('[Yeelight LAN] <- %s %s', this.address, line);

		let frame: ReplyFrame;
		try {
			frame = JSON.parse(line) as ReplyFrame;
		} catch (err) {
			this.failPending(new TransportError(
				'protocol',
				`malformed reply from ${this.address}: ${line}`,
				{ cause: err },
			));
			return;
		}

		if (typeof frame.id !== 'number') {
			// Unsolicited "props" notification; state is only taken from polls.
			this.log.debug('[Yeelight LAN] ignoring notification method=%s', String(frame.method));
			return;
		}

		const request = this.pending.get(frame.id);
		if (!request) {
			this.log.debug('[Yeelight LAN] reply for unknown id=%d', frame.id);
			return;
		}
		this.pending.delete(frame.id);
		clearTimeout(request.timer);

		if (frame.error) {
			request.reject(new TransportError(
				'device',
				`${request.method} rejected by ${this.address}: ${frame.error.message ?? 'unknown error'} (code ${frame.error.code ?? '?'})`,
			));
			return;
		}

		if (!Array.isArray(frame.result)) {
			request.reject(new TransportError(
				'protocol',
				`${request.method} reply from ${this.address} carries no result`,
			));
			return;
		}

		request.resolve(frame.result);
	}

	private failPending(err: TransportError): void {
		for (const [id, request] of this.pending) {
			clearTimeout(request.timer);
			this.pending.delete(id);
			request.reject(err);
		}
	}
}

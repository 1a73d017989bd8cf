import { ValidationError } from './Errors';

const NODE_URI = /^([0-9a-fA-F]{66})@(\[[0-9a-fA-F:.]+\]|[^\s@:[\]]+):(\d{1,5})$/;

/**
 * `<pubkey>@<host>:<port>` address of a Lightning node, where the pubkey is a 33-byte compressed
 * public key in hex.
 */
export class LightningNodeUri {
	readonly uri: string;
	readonly key: string;
	readonly host: string;
	readonly port: number;

	private constructor(uri: string, key: string, host: string, port: number) {
		this.uri = uri;
		this.key = key;
		this.host = host;
		this.port = port;
		Object.freeze(this);
	}

	static from(input: unknown, field = 'uri'): LightningNodeUri {
		if (input instanceof LightningNodeUri) return input;
		if (typeof input !== 'string') {
			throw new ValidationError(field, 'must be a string');
		}
		const match = NODE_URI.exec(input);
		if (!match) {
			throw new ValidationError(field, `"${input}" is not a <pubkey>@<host>:<port> node URI`);
		}
		const [, key, host, portText] = match;
		const port = Number(portText);
		if (port < 1 || port > 65535) {
			throw new ValidationError(field, `port ${port} is out of range`);
		}
		return new LightningNodeUri(input, key, host, port);
	}

	toString(): string {
		return this.uri;
	}

	toJSON(): string {
		return this.toString();
	}
}

import { describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import { ConsoleLogger, getLogger, setLogger } from '../src/index.ts';
import { RecordingLogger } from './helpers.ts';

describe('logging', () => {
	it('prefixes console output with the context', () => {
		const warn = mock.method(console, 'warn', () => {});
		try {
			new ConsoleLogger('[ctx]').warn('message', 42);
			new ConsoleLogger().warn('plain');
			assert.deepEqual(
				warn.mock.calls.map((call) => call.arguments),
				[['[ctx]', 'message', 42], ['plain']],
			);
		} finally {
			warn.mock.restore();
		}
	});

	it('swaps the current logger and hands back the previous one', () => {
		const original = getLogger();
		const recording = new RecordingLogger();
		assert.equal(setLogger(recording), original);
		assert.equal(getLogger(), recording);
		assert.equal(setLogger(original), recording);
	});
});

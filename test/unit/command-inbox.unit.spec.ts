/**
 * Command Inbox Tests
 */

import { describe, it, expect } from '@jest/globals';
import { CommandInbox } from '../../src/command-inbox';
import type { Command } from '../../src/commands/types';

const cmd = (id: number | string): Command => ({ id, kind: 'get_status', payload: {} });

describe('CommandInbox', () => {
	const signal = new AbortController().signal;

	it('should hand out commands in arrival order', async () => {
		const inbox = new CommandInbox();
		inbox.push(cmd(1), 'realtime');
		inbox.push(cmd(2), 'fallback');

		expect((await inbox.next(signal))?.command.id).toBe(1);
		const second = await inbox.next(signal);
		expect(second?.command.id).toBe(2);
		expect(second?.source).toBe('fallback');
		expect(inbox.size()).toBe(0);
	});

	it('should resolve a waiting consumer on push', async () => {
		const inbox = new CommandInbox();
		const pending = inbox.next(signal);

		inbox.push(cmd(3), 'realtime');

		expect((await pending)?.command).toEqual(cmd(3));
		expect(inbox.size()).toBe(0);
	});

	it('should reject a command id it has already accepted', () => {
		const inbox = new CommandInbox();

		expect(inbox.push(cmd(4), 'realtime')).toBe(true);
		expect(inbox.push(cmd(4), 'fallback')).toBe(false);
		expect(inbox.size()).toBe(1);
	});

	it('should forget the oldest ids past its window', () => {
		const inbox = new CommandInbox(2);
		inbox.push(cmd(1), 'realtime');
		inbox.push(cmd(2), 'realtime');
		inbox.push(cmd(3), 'realtime');

		expect(inbox.push(cmd(1), 'realtime')).toBe(true);
		expect(inbox.push(cmd(3), 'realtime')).toBe(false);
	});

	it('should resolve undefined once the signal aborts', async () => {
		const inbox = new CommandInbox();
		const controller = new AbortController();
		const pending = inbox.next(controller.signal);

		controller.abort();

		expect(await pending).toBeUndefined();
		// The aborted consumer no longer takes commands
		inbox.push(cmd(5), 'realtime');
		expect(inbox.size()).toBe(1);
	});
});

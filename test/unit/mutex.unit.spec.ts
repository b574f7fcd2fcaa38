/**
 * Lock Tests
 */

import { describe, it, expect } from '@jest/globals';
import { KeyedMutex, Mutex } from '../../src/utils/mutex';
import { sleep } from '../../src/utils/sleep';

describe('Mutex', () => {
	it('should run callers one at a time in arrival order', async () => {
		const mutex = new Mutex();
		const events: string[] = [];
		const task = (name: string, ms: number) => mutex.runExclusive(async () => {
			events.push(`${name}:start`);
			await sleep(ms);
			events.push(`${name}:end`);
			return name;
		});

		const results = await Promise.all([task('a', 20), task('b', 1), task('c', 5)]);

		expect(results).toEqual(['a', 'b', 'c']);
		expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
		expect(mutex.isLocked()).toBe(false);
	});

	it('should release the lock when the holder throws', async () => {
		const mutex = new Mutex();

		await expect(mutex.runExclusive(async () => {
			throw new Error('boom');
		})).rejects.toThrow('boom');

		expect(await mutex.runExclusive(() => 'next')).toBe('next');
	});
});

describe('KeyedMutex', () => {
	it('should let different keys proceed in parallel', async () => {
		const locks = new KeyedMutex();
		let active = 0;
		let maxActive = 0;
		const task = (key: string) => locks.runExclusive(key, async () => {
			active++;
			maxActive = Math.max(maxActive, active);
			await sleep(10);
			active--;
		});

		await Promise.all([task('a'), task('b')]);

		expect(maxActive).toBe(2);
	});

	it('should serialize the same key and release idle keys', async () => {
		const locks = new KeyedMutex();
		let active = 0;
		let maxActive = 0;
		const task = () => locks.runExclusive('device:a', async () => {
			active++;
			maxActive = Math.max(maxActive, active);
			await sleep(5);
			active--;
		});

		const pending = Promise.all([task(), task(), task()]);
		expect(locks.isLocked('device:a')).toBe(true);
		await pending;

		expect(maxActive).toBe(1);
		expect(locks.isLocked('device:a')).toBe(false);
		expect(locks.size()).toBe(0);
	});
});

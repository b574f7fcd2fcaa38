/**
 * Real-time frame and envelope tests
 */

import { describe, it, expect } from '@jest/globals';
import { ProtocolFault, TransportFault } from '../../src/errors';
import { encodeEnvelope, parseInboundFrame } from '../../src/transport/envelopes';
import { FrameAssembler } from '../../src/transport/frame-assembler';

describe('FrameAssembler', () => {
	it('should join fragments at the final chunk', () => {
		const assembler = new FrameAssembler();

		expect(assembler.push('{"type":', false)).toBeUndefined();
		expect(assembler.push(Buffer.from('"ping"}'), true)).toBe('{"type":"ping"}');
		expect(assembler.push('{}', true)).toBe('{}');
	});

	it('should reject a frame over the size limit and start over', () => {
		const assembler = new FrameAssembler(10);

		assembler.push('123456', false);
		expect(() => assembler.push('78901', true)).toThrow(
			new TransportFault('Frame exceeds 10 bytes (11 received)'),
		);
		expect(assembler.push('ok', true)).toBe('ok');
	});

	it('should count multi-byte characters by their encoded size', () => {
		const assembler = new FrameAssembler(4);

		expect(() => assembler.push('ééé', true)).toThrow(TransportFault);
	});
});

describe('parseInboundFrame', () => {
	it('should parse a command envelope', () => {
		const message = parseInboundFrame(
			JSON.stringify({ type: 'command', command: { id: 7, kind: 'get_status', deviceId: 'LaserJet-1' } }),
		);

		expect(message).toEqual({
			kind: 'command',
			command: { id: 7, kind: 'get_status', deviceId: 'LaserJet-1', payload: {} },
		});
	});

	it('should accept the legacy body and commandType fields', () => {
		const message = parseInboundFrame(
			JSON.stringify({
				type: 'command',
				body: { id: 'abc', commandType: 'clear_queue', payload: { deviceName: 'X' } },
			}),
		);

		expect(message).toEqual({
			kind: 'command',
			command: { id: 'abc', kind: 'clear_queue', payload: { deviceName: 'X' } },
		});
	});

	it('should omit a null device id', () => {
		const message = parseInboundFrame(
			JSON.stringify({ type: 'command', command: { id: 1, kind: 'restart_subsystem', deviceId: null, payload: null } }),
		);

		expect(message).toEqual({ kind: 'command', command: { id: 1, kind: 'restart_subsystem', payload: {} } });
	});

	it('should ignore envelopes of other types', () => {
		expect(parseInboundFrame('{"type":"pong"}')).toEqual({ kind: 'ignored', type: 'pong' });
	});

	it('should reject text that is not JSON', () => {
		expect(() => parseInboundFrame('not json')).toThrow(new ProtocolFault('Frame is not valid JSON'));
	});

	it('should reject JSON without a type', () => {
		expect(() => parseInboundFrame('[1,2]')).toThrow(new ProtocolFault('Frame is not an envelope'));
	});

	it('should reject a command without an id', () => {
		expect(() => parseInboundFrame('{"type":"command","command":{"kind":"get_status"}}')).toThrow(ProtocolFault);
	});

	it('should mark a command without a kind as rejected', () => {
		expect(parseInboundFrame('{"type":"command","command":{"id":3}}')).toEqual({
			kind: 'command',
			command: { id: 3, kind: '', payload: {}, rejection: 'Invalid command: kind: Command kind is required' },
		});
	});

	it('should accept a numeric device id as a string', () => {
		const message = parseInboundFrame(
			JSON.stringify({ type: 'command', command: { id: 11, kind: 'get_status', deviceId: 42 } }),
		);

		expect(message).toEqual({
			kind: 'command',
			command: { id: 11, kind: 'get_status', deviceId: '42', payload: {} },
		});
	});

	it('should mark a command with an invalid payload as rejected', () => {
		expect(parseInboundFrame('{"type":"command","command":{"id":"job-4","kind":"fix_device","payload":"oops"}}')).toEqual({
			kind: 'command',
			command: {
				id: 'job-4',
				kind: '',
				payload: {},
				rejection: 'Invalid command: payload: Expected object, received string',
			},
		});
	});
});

describe('encodeEnvelope', () => {
	it('should serialize a command result envelope', () => {
		const frame = encodeEnvelope({
			type: 'command_result',
			commandId: 8,
			result: { success: false, message: 'Device name is required', actionsTaken: [] },
		});

		expect(frame).toBe(
			'{"type":"command_result","commandId":8,"result":{"success":false,"message":"Device name is required","actionsTaken":[]}}',
		);
	});
});

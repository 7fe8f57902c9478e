import {describe, it, expect} from 'vitest';
import {parseDecision} from './decision';

describe('parseDecision', () => {
	it('maps Y, R and Q in either case', () => {
		expect(parseDecision('Y')).toBe('accept');
		expect(parseDecision('y')).toBe('accept');
		expect(parseDecision('R')).toBe('regenerate');
		expect(parseDecision('r')).toBe('regenerate');
		expect(parseDecision('Q')).toBe('quit');
		expect(parseDecision('q')).toBe('quit');
	});

	it('ignores surrounding whitespace', () => {
		expect(parseDecision('  y \n')).toBe('accept');
	});

	it('rejects everything else', () => {
		for (const input of ['', 'x', 'yes', 'YR', 'quit', ' ']) {
			expect(parseDecision(input)).toBeNull();
		}
	});
});

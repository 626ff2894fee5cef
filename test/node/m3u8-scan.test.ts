import { expect, test, describe } from 'vitest';
import {
	dispatchTag,
	isSegmentLocator,
	parseFractionalSeconds,
	parseUnsignedInteger,
} from '../../src/hls/m3u8-parser.js';

describe('dispatchTag', () => {
	test('recognizes the supported tags', () => {
		expect(dispatchTag('#EXT-X-TARGETDURATION:10')).toBe('target-duration');
		expect(dispatchTag('#EXT-X-VERSION:3')).toBe('version');
		expect(dispatchTag('#EXTINF:5.005,')).toBe('segment-duration');
		expect(dispatchTag('#EXT-X-DISCONTINUITY')).toBe('discontinuity');
		expect(dispatchTag('#EXT-X-ENDLIST')).toBe('end-list');
	});

	test('treats any line containing the discontinuity tag as a boundary', () => {
		expect(dispatchTag('#EXT-X-DISCONTINUITY-SEQUENCE:4')).toBe('discontinuity');
	});

	test('matches tags anywhere in the line', () => {
		expect(dispatchTag('  #EXT-X-ENDLIST')).toBe('end-list');
		expect(dispatchTag('EXT-X-TARGETDURATION:8')).toBe('target-duration');
	});

	test('returns null for unsupported lines', () => {
		expect(dispatchTag('#EXT-X-BYTERANGE:1000@0')).toBeNull();
		expect(dispatchTag('#EXT-X-MEDIA-SEQUENCE:1')).toBeNull();
		expect(dispatchTag('#EXT-X-VERSION')).toBeNull();
		expect(dispatchTag('segment.ts')).toBeNull();
		expect(dispatchTag('')).toBeNull();
	});

	test('is case sensitive', () => {
		expect(dispatchTag('#ext-x-endlist')).toBeNull();
	});
});

describe('isSegmentLocator', () => {
	test('accepts transport stream locators', () => {
		expect(isSegmentLocator('segment_1.ts')).toBe(true);
		expect(isSegmentLocator('https://example.com/a.ts?x=1')).toBe(true);
	});

	test('rejects other lines', () => {
		expect(isSegmentLocator('segment_1.m4s')).toBe(false);
		expect(isSegmentLocator('#EXT-X-BYTERANGE:1000@0')).toBe(false);
		expect(isSegmentLocator('')).toBe(false);
	});
});

describe('parseUnsignedInteger', () => {
	test('parses plain integers', () => {
		expect(parseUnsignedInteger('20')).toBe(20);
		expect(parseUnsignedInteger('0')).toBe(0);
	});

	test('drops non-digit characters', () => {
		expect(parseUnsignedInteger(' 10s')).toBe(10);
		expect(parseUnsignedInteger('-6')).toBe(6);
	});

	test('returns null when no digits remain', () => {
		expect(parseUnsignedInteger('abc')).toBeNull();
		expect(parseUnsignedInteger('')).toBeNull();
	});

	test('returns null for values beyond the safe integer range', () => {
		expect(parseUnsignedInteger('99999999999999999999')).toBeNull();
	});
});

describe('parseFractionalSeconds', () => {
	test('parses decimals', () => {
		expect(parseFractionalSeconds('12.166')).toBe(12.166);
		expect(parseFractionalSeconds('10')).toBe(10);
		expect(parseFractionalSeconds('.5')).toBe(0.5);
		expect(parseFractionalSeconds('5.')).toBe(5);
	});

	test('drops characters other than digits and dots', () => {
		expect(parseFractionalSeconds('7.5s')).toBe(7.5);
		expect(parseFractionalSeconds(' 4.004 ')).toBe(4.004);
	});

	test('returns null for malformed decimals', () => {
		expect(parseFractionalSeconds('1.2.3')).toBeNull();
		expect(parseFractionalSeconds('.')).toBeNull();
		expect(parseFractionalSeconds('abc')).toBeNull();
		expect(parseFractionalSeconds('')).toBeNull();
	});
});

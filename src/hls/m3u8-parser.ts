/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import type {
	DiscontinuityGroup,
	MediaPlaylist,
	MediaSegment,
	NumericTag,
	ParseOptions,
	ParseWarning,
} from './m3u8-types';
import { toMilliseconds } from './m3u8-utils';

/**
 * Identifies the kind of failure behind an {@link M3U8ParseError}.
 * @group Miscellaneous
 * @public
 */
export type M3U8ParseErrorCode = 'missing-header' | 'missing-version' | 'invalid-value';

/**
 * Error thrown when parsing an M3U8 playlist fails.
 * @group Miscellaneous
 * @public
 */
export class M3U8ParseError extends Error {
	/** What went wrong. */
	public code: M3U8ParseErrorCode;
	/** The line number where the error occurred, if available. */
	public lineNumber?: number;

	/**
	 * Creates a new M3U8ParseError.
	 * @param code - The kind of failure.
	 * @param message - The error message.
	 * @param lineNumber - The line number where the error occurred.
	 */
	constructor(code: M3U8ParseErrorCode, message: string, lineNumber?: number) {
		super(lineNumber !== undefined ? `Line ${lineNumber}: ${message}` : message);
		this.name = 'M3U8ParseError';
		this.code = code;
		this.lineNumber = lineNumber;
	}
}

const HEADER = '#EXTM3U';
const TARGET_DURATION_TAG = 'EXT-X-TARGETDURATION';
const VERSION_TAG = '#EXT-X-VERSION:';
const SEGMENT_DURATION_TAG = '#EXTINF:';
const DISCONTINUITY_TAG = '#EXT-X-DISCONTINUITY';
const END_LIST_TAG = '#EXT-X-ENDLIST';
const SEGMENT_LOCATOR_MARKER = '.ts';

/**
 * The supported tags a scanned line can carry.
 * @internal
 */
export type TagKind = 'target-duration' | 'version' | 'segment-duration' | 'discontinuity' | 'end-list';

/**
 * Scanner state. After an #EXTINF tag the scanner skips every line until it finds the segment locator.
 * @internal
 */
export type ScanState =
	| { kind: 'scanning' }
	| { kind: 'awaiting-locator'; duration: number };

/**
 * Returns the supported tag carried by a line, or null when the line has no effect on the playlist.
 * Matching is by substring and the first match wins.
 * @internal
 */
export const dispatchTag = (line: string): TagKind | null => {
	if (line.includes(TARGET_DURATION_TAG)) {
		return 'target-duration';
	} else if (line.includes(VERSION_TAG)) {
		return 'version';
	} else if (line.includes(SEGMENT_DURATION_TAG)) {
		return 'segment-duration';
	} else if (line.includes(DISCONTINUITY_TAG)) {
		return 'discontinuity';
	} else if (line.includes(END_LIST_TAG)) {
		return 'end-list';
	}

	return null;
};

/**
 * Whether a line is accepted as the locator of a transport stream segment.
 * @internal
 */
export const isSegmentLocator = (line: string): boolean => line.includes(SEGMENT_LOCATOR_MARKER);

/**
 * Keeps only the digits of `str` and parses them as a non-negative integer.
 * Returns null when nothing usable remains.
 * @internal
 */
export const parseUnsignedInteger = (str: string): number | null => {
	const digits = str.replace(/[^0-9]/g, '');
	if (digits === '') {
		return null;
	}

	const value = Number(digits);
	return Number.isSafeInteger(value) ? value : null;
};

/**
 * Keeps only the digits and dots of `str` and parses them as a number of seconds.
 * Returns null when the result is not a valid decimal (for example `1.2.3`).
 * @internal
 */
export const parseFractionalSeconds = (str: string): number | null => {
	const digits = str.replace(/[^0-9.]/g, '');
	if (!/^(\d+\.?\d*|\.\d+)$/.test(digits)) {
		return null;
	}

	const value = Number(digits);
	return Number.isFinite(value) ? value : null;
};

/**
 * Payload of a tag that is expected at the start of the line. The slice is taken at the tag's length
 * whether or not the tag actually starts there.
 */
const payloadAfter = (line: string, tag: string) => line.slice(tag.length);

/**
 * Parses a media playlist string.
 *
 * The first line must be `#EXTM3U` and an #EXT-X-VERSION tag must be present. Malformed numeric payloads are
 * tolerated by default: the previous value is kept and a {@link ParseWarning} is recorded on the result. Pass
 * `strict: true` to turn them into errors instead.
 *
 * Only segments whose locator contains `.ts` are recognized. Lines between an #EXTINF tag and its locator are
 * skipped, and an #EXTINF tag with no locator after it produces no segment.
 *
 * @throws {@link M3U8ParseError} when the header or version is missing, or on a malformed value in strict mode.
 * @group Miscellaneous
 * @public
 */
export const parseMediaPlaylist = (content: string, options: ParseOptions = {}): MediaPlaylist => {
	const lines = content.split(/\r?\n/);

	if (lines[0] !== HEADER) {
		throw new M3U8ParseError('missing-header', 'Missing #EXTM3U header');
	}

	const segments: MediaSegment[] = [];
	const discontinuities: DiscontinuityGroup[] = [];
	const warnings: ParseWarning[] = [];
	let ended = false;
	let targetDuration = 0;
	let version: number | null = null;

	let state: ScanState = { kind: 'scanning' };
	let pendingDuration = 0;
	let pendingDiscontinuity = true;

	const reportInvalid = (tag: NumericTag, lineNumber: number, payload: string) => {
		const message = `${tag}: expected a number, got '${payload}'`;
		if (options.strict) {
			throw new M3U8ParseError('invalid-value', message, lineNumber);
		}

		const warning: ParseWarning = { lineNumber, tag, message };
		warnings.push(warning);
		if (options.onWarning) {
			options.onWarning(warning);
		} else {
			console.warn(`Line ${lineNumber}: ${message}`);
		}
	};

	for (let i = 1; i < lines.length; i++) {
		const line = lines[i]!;
		const lineNumber = i + 1;

		if (state.kind === 'awaiting-locator') {
			if (!isSegmentLocator(line)) {
				continue;
			}

			const duration = state.duration;
			segments.push({ duration, url: line });

			const lastGroup = discontinuities[discontinuities.length - 1];
			if (pendingDiscontinuity || !lastGroup) {
				discontinuities.push({ duration, segments: [{ duration, url: line }] });
				pendingDiscontinuity = false;
			} else {
				const totalMs = toMilliseconds(lastGroup.duration) + toMilliseconds(duration);
				lastGroup.duration = totalMs / 1000;
				lastGroup.segments.push({ duration, url: line });
			}

			state = { kind: 'scanning' };
			continue;
		}

		switch (dispatchTag(line)) {
			case 'target-duration': {
				const payload = line.slice(line.lastIndexOf(':') + 1);
				const value = parseUnsignedInteger(payload);
				if (value === null) {
					reportInvalid('EXT-X-TARGETDURATION', lineNumber, payload);
				} else {
					targetDuration = value;
				}
				break;
			}

			case 'version': {
				// Unlike the other tags, a bad version is not skipped over: it clears any earlier value
				const payload = payloadAfter(line, VERSION_TAG);
				const value = /^\d+$/.test(payload) ? Number(payload) : NaN;
				if (Number.isSafeInteger(value)) {
					version = value;
				} else {
					version = null;
					reportInvalid('EXT-X-VERSION', lineNumber, payload);
				}
				break;
			}

			case 'segment-duration': {
				const payload = payloadAfter(line, SEGMENT_DURATION_TAG).split(',')[0]!;
				const value = parseFractionalSeconds(payload);
				if (value === null) {
					reportInvalid('EXTINF', lineNumber, payload);
				} else {
					pendingDuration = value;
				}
				state = { kind: 'awaiting-locator', duration: pendingDuration };
				break;
			}

			case 'discontinuity':
				pendingDiscontinuity = true;
				break;

			case 'end-list':
				ended = true;
				break;

			case null:
				break;
		}
	}

	if (version === null) {
		throw new M3U8ParseError('missing-version', 'Missing #EXT-X-VERSION');
	}

	return {
		ended,
		segments,
		targetDuration,
		version,
		discontinuities,
		warnings,
	};
};

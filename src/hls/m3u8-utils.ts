/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

import type { MediaPlaylist } from './m3u8-types';

/**
 * Converts seconds to whole milliseconds.
 * @internal
 */
export const toMilliseconds = (seconds: number): number => {
	return Math.round(seconds * 1000);
};

/**
 * Resolves a segment locator relative to the URL the playlist was loaded from.
 * @group Miscellaneous
 * @public
 */
export const resolveUrl = (uri: string, baseUrl: string): string => {
	return new URL(uri, baseUrl).href;
};

/**
 * Returns the total duration of a playlist in seconds, summed in whole milliseconds.
 * @group Miscellaneous
 * @public
 */
export const getPlaylistDuration = (playlist: MediaPlaylist): number => {
	let totalMs = 0;
	for (const segment of playlist.segments) {
		totalMs += toMilliseconds(segment.duration);
	}

	return totalMs / 1000;
};

/**
 * Finds the index of the segment that contains the given time (in seconds). Times before the start map to the
 * first segment and times past the end map to the last one. Returns -1 if the playlist has no segments.
 * @group Miscellaneous
 * @public
 */
export const getSegmentIndexAtTime = (playlist: MediaPlaylist, time: number): number => {
	const { segments } = playlist;
	if (segments.length === 0) {
		return -1;
	}
	if (!Number.isFinite(time) || time <= 0) {
		return 0;
	}

	let startMs = 0;
	for (let i = 0; i < segments.length; i++) {
		const endMs = startMs + toMilliseconds(segments[i]!.duration);
		if (time < endMs / 1000) {
			return i;
		}
		startMs = endMs;
	}

	return segments.length - 1;
};

/**
 * Returns the index of the discontinuity group owning the segment at `segmentIndex` in `playlist.segments`,
 * or -1 if the index is out of range.
 * @group Miscellaneous
 * @public
 */
export const getDiscontinuityGroupIndex = (playlist: MediaPlaylist, segmentIndex: number): number => {
	if (!Number.isInteger(segmentIndex) || segmentIndex < 0) {
		return -1;
	}

	let remaining = segmentIndex;
	for (let i = 0; i < playlist.discontinuities.length; i++) {
		const groupSize = playlist.discontinuities[i]!.segments.length;
		if (remaining < groupSize) {
			return i;
		}
		remaining -= groupSize;
	}

	return -1;
};

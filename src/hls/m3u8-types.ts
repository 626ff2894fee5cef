/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

/**
 * Represents a media segment.
 * @group Miscellaneous
 * @public
 */
export type MediaSegment = {
	/** Segment duration in seconds, from the #EXTINF tag. */
	duration: number;
	/** Locator of the segment, exactly as written in the playlist. */
	url: string;
};

/**
 * A run of segments between two #EXT-X-DISCONTINUITY tags (or the start or end of the playlist).
 * @group Miscellaneous
 * @public
 */
export type DiscontinuityGroup = {
	/** Sum of the member segment durations in seconds, accumulated in whole milliseconds. */
	duration: number;
	/** Segments belonging to this group, in playlist order. */
	segments: MediaSegment[];
};

/**
 * Tags whose payload is parsed as a number.
 * @group Miscellaneous
 * @public
 */
export type NumericTag = 'EXT-X-TARGETDURATION' | 'EXT-X-VERSION' | 'EXTINF';

/**
 * A non-fatal diagnostic produced while parsing leniently.
 * @group Miscellaneous
 * @public
 */
export type ParseWarning = {
	/** 1-based line number of the offending line. */
	lineNumber: number;
	/** The tag whose payload could not be parsed. */
	tag: NumericTag;
	message: string;
};

/**
 * Represents a media playlist.
 * @group Miscellaneous
 * @public
 */
export type MediaPlaylist = {
	/** Whether an #EXT-X-ENDLIST tag was found. */
	ended: boolean;
	/** Media segments. */
	segments: MediaSegment[];
	/** Target duration in whole seconds (maximum segment duration). */
	targetDuration: number;
	/** HLS version. */
	version: number;
	/** Segments grouped by discontinuity. */
	discontinuities: DiscontinuityGroup[];
	/** Diagnostics for malformed numeric payloads that were tolerated. */
	warnings: ParseWarning[];
};

/**
 * Options for {@link parseMediaPlaylist}.
 * @group Miscellaneous
 * @public
 */
export type ParseOptions = {
	/**
	 * Throw on a malformed numeric payload instead of keeping the previous value. Defaults to false.
	 */
	strict?: boolean;
	/**
	 * Called for every tolerated diagnostic. When omitted, diagnostics are logged with `console.warn`.
	 */
	onWarning?: (warning: ParseWarning) => void;
};

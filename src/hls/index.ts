/*!
 * Copyright (c) 2025-present, Vanilagy and contributors
 *
 * This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/.
 */

// M3U8 Parser
export {
	parseMediaPlaylist,
	M3U8ParseError,
} from './m3u8-parser';
export type { M3U8ParseErrorCode } from './m3u8-parser';

// M3U8 Types
export type {
	MediaPlaylist,
	MediaSegment,
	DiscontinuityGroup,
	NumericTag,
	ParseOptions,
	ParseWarning,
} from './m3u8-types';

// Playlist queries
export {
	getPlaylistDuration,
	getSegmentIndexAtTime,
	getDiscontinuityGroupIndex,
	resolveUrl,
} from './m3u8-utils';

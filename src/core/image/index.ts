// src/core/image/index.ts

import type { ArrayImage } from './ArrayImage.ts';
import type { ObjectImage } from './ObjectImage.ts';

export { ArrayImage } from './ArrayImage.ts';
export { ObjectImage } from './ObjectImage.ts';
export { channelsForMode, modeForChannels, toChannelCount } from './channels.ts';

/**
 * Any image the engine accepts.
 */
export type Image = ObjectImage | ArrayImage;

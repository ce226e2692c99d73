/**
 * @hls-kit/packaging
 *
 * Output packaging layer.
 *
 * Responsibilities:
 * - Render the HLS master playlist
 * - Write it next to the rendition directories
 */

export {
  renderMasterPlaylist,
  buildMasterPlaylist,
  MASTER_PLAYLIST_FILENAME,
  VIDEO_CODECS,
  AUDIO_GROUP_ID,
  type MasterAudioEntry,
  type MasterVariantEntry,
} from './playlist.js';

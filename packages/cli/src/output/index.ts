/**
 * Report output exports
 */

export type { GalleryReport, ReportSettings } from './gallery.js';
export { buildGalleryReport, reportSettings, serializeReport } from './gallery.js';

/**
 * Tag Image Tool
 */

export { tagImage, type TagImageParams, type TagImageResult } from './tool';

/**
 * Build Image Tool
 */

export { buildImage, type BuildImageParams, type BuildImageResult } from './tool';

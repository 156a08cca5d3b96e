/**
 * Push Image Tool
 */

export { pushImage, type PushImageParams, type PushImageResult } from './tool';

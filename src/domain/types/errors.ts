/**
 * Process exit codes
 *
 * Every fatal condition maps to exactly one of these values; the CLI never
 * exits with anything else.
 */
export enum ExitCode {
  OK = 0,
  UNKNOWN = 1,
  CROSS = 3,
  DOCKER_BUILD = 4,
  DOCKER_DIE = 5,
  DOCKER_PUSH = 6,
  DOCKER_TAG = 7,
  DOCKER_TIMEOUT = 8,
  DOCKERFILE = 9,
  GIT_CLONE = 10,
  GIT = 11,
  INVALID_TYPE = 12,
  MULTISTAGE = 13,
  NO_ARCHS = 14,
  NO_IMAGE_NAME = 15,
  NOT_EMPTY = 16,
  PRIVILEGES = 17,
  SUPPORTED = 18,
  VERSION = 19,
  NO_FROM = 20,
  DOCKER_UNAVAILABLE = 21,
  INVALID_MANIFEST = 22,
  INTERRUPTED = 130,
}

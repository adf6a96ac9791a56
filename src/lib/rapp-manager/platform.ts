import type { PlatformInfo } from './types';

export const PLATFORM_WILDCARD = '*';

/**
 * `platform.system.robot`, e.g. `linux.ros.turtlebot`
 */
export function platformTuple(info: PlatformInfo): string {
  return [info.platform, info.system, info.robot].join('.');
}

/**
 * Whether a rapp's compatibility descriptor matches this robot's platform tuple.
 *
 * Both sides are dotted strings compared segment by segment; `*` on either
 * side matches anything, and a descriptor shorter than the tuple only
 * constrains the segments it names.
 *
 * ```typescript
 * isPlatformCompatible('linux.ros.turtlebot', 'linux.ros.*'); // true
 * isPlatformCompatible('linux.ros.turtlebot', 'linux.ros.pr2'); // false
 * ```
 */
export function isPlatformCompatible(tuple: string, descriptor: string): boolean {
  const robotSegments = tuple.split('.');
  const rappSegments = descriptor.trim() === '' ? [] : descriptor.split('.');

  if (rappSegments.length > robotSegments.length) {
    return false;
  }

  return rappSegments.every((segment, index) => {
    const robotSegment = robotSegments[index];

    return (
      segment === PLATFORM_WILDCARD ||
      robotSegment === PLATFORM_WILDCARD ||
      segment === robotSegment
    );
  });
}

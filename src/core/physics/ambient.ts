/**
 * Exterior boundary conditions
 *
 * The exterior alternates between a day and a night plateau. The dome's own
 * thermal lag smooths the transitions.
 */

import type { AmbientConditions, AmbientProfile } from './types';

/**
 * Exterior conditions at a simulation time
 * @param timeSec - Simulation time in seconds
 * @param profile - Day/night profile
 */
export function ambientAt(timeSec: number, profile: AmbientProfile): AmbientConditions {
  const hours = timeSec / 3600 + profile.phaseOffsetHours;
  let cycleHour = hours % profile.cycleHours;
  if (cycleHour < 0) {
    cycleHour += profile.cycleHours;
  }
  const daylight = cycleHour < profile.dayFraction * profile.cycleHours;

  return {
    exteriorTempC: daylight ? profile.dayTempC : profile.nightTempC,
    solarFraction: daylight ? 1 : 0,
    atmosphere: profile.atmosphere
  };
}

export { photoperiodFraction, supplementalLighting, RAMP_HOURS } from './lighting';

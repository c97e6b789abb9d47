export { toHours, simulationDay, hourOfDay } from './time';
export { formatDuration } from './helpers';

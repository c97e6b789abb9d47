/**
 * Core control - the closed loop of every dome
 *
 * - pid: Discrete PID loops with anti-windup
 * - physics: First-order lag plant model and exterior day/night cycle
 * - lighting: Photoperiod schedule with supplemental lamps
 * - mode: Operating mode state machine
 * - emergency: Hazard predicates, corrective actions and the emergency log
 * - energy: Per-channel power draw and energy ledger
 */

export * from './pid';
export * from './physics';
export * from './lighting';
export * from './mode';
export * from './emergency';
export * from './energy';

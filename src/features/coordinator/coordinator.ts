/**
 * Multi-dome coordinator
 *
 * Relieves O₂ deficits by moving surplus from donor domes. Deficits are
 * served most severe first; each draws from every donor in proportion to
 * its surplus above its floor. A grant may be partial. When no donor has
 * surplus the deficit is declined and left to the dome's emergency monitor.
 * Domes in SHUTDOWN take no part.
 *
 * Per dome the shared thresholds are raised to its own viability threshold:
 * a donor never gives below max(surplusPct, own), a dome is in deficit below
 * max(viabilityPct, own) and is topped up to max(restoreTargetPct, own).
 */

import { MODES } from '$types/common';
import type { Logger } from '@logging';

import type {
  CoordinatedDome,
  CoordinatorConfig,
  DeclinedDeficit,
  DomeO2,
  RedistributionPlan,
  Transfer
} from './types';

/**
 * Compute transfers for a set of post-tick O₂ readings
 *
 * Pure: nothing is applied.
 *
 * @param domes - O₂ level and mode of every dome
 * @param config - Thresholds
 * @returns Deltas summing to zero, transfers and declined deficits
 */
export function planRedistribution(domes: DomeO2[], config: CoordinatorConfig): RedistributionPlan {
  const deltas: Record<string, number> = {};
  const transfers: Transfer[] = [];
  const declined: DeclinedDeficit[] = [];

  const active = domes.filter(function(d) { return d.mode !== MODES.SHUTDOWN; });
  for (const dome of active) {
    deltas[dome.domeId] = 0;
  }

  const available = new Map<string, number>();
  for (const dome of active) {
    const floor = Math.max(config.surplusPct, dome.viabilityPct);
    if (dome.o2Pct > floor) {
      available.set(dome.domeId, dome.o2Pct - floor);
    }
  }

  const deficits = active
    .filter(function(d) { return d.o2Pct < Math.max(config.viabilityPct, d.viabilityPct); })
    .sort(function(a, b) { return a.o2Pct - b.o2Pct; });

  for (const recipient of deficits) {
    const requested = Math.max(config.restoreTargetPct, recipient.viabilityPct) - recipient.o2Pct;
    let pool = 0;
    for (const amount of available.values()) {
      pool += amount;
    }

    if (pool <= 0) {
      declined.push({ domeId: recipient.domeId, o2Pct: recipient.o2Pct, requestedPct: requested, grantedPct: 0 });
      continue;
    }

    const grant = Math.min(requested, pool);
    let granted = 0;
    for (const [donorId, amount] of available) {
      const take = Math.min(amount, grant * amount / pool);
      if (take <= 0) continue;
      available.set(donorId, amount - take);
      deltas[donorId] = (deltas[donorId] ?? 0) - take;
      granted += take;
      transfers.push({ from: donorId, to: recipient.domeId, amountPct: take });
    }
    deltas[recipient.domeId] = (deltas[recipient.domeId] ?? 0) + granted;

    if (granted < requested) {
      declined.push({ domeId: recipient.domeId, o2Pct: recipient.o2Pct, requestedPct: requested, grantedPct: granted });
    }
  }

  return { deltas: deltas, transfers: transfers, declined: declined };
}

/**
 * Run one redistribution pass over live domes
 *
 * Reads every dome first, then applies all deltas together.
 *
 * @param domes - Domes owned by the caller
 * @param config - Thresholds
 * @param logger - Receives transfer and "redistribution declined" notes
 */
export function rebalance(domes: CoordinatedDome[], config: CoordinatorConfig, logger: Logger): RedistributionPlan {
  const snapshot: DomeO2[] = domes.map(function(dome) {
    return {
      domeId: dome.id,
      o2Pct: dome.getReading().o2Pct,
      mode: dome.getMode(),
      viabilityPct: dome.getO2ViabilityPct()
    };
  });

  const plan = planRedistribution(snapshot, config);

  for (const dome of domes) {
    const delta = plan.deltas[dome.id];
    if (delta !== undefined && delta !== 0) {
      dome.applyResourceDelta(delta);
    }
  }

  for (const transfer of plan.transfers) {
    logger.info("O2 transfer " + transfer.from + " -> " + transfer.to + ": " + transfer.amountPct.toFixed(2) + "%");
  }
  for (const deficit of plan.declined) {
    logger.info(
      "redistribution declined for " + deficit.domeId + ": O2 " + deficit.o2Pct.toFixed(2) +
      "%, requested " + deficit.requestedPct.toFixed(2) + "%, granted " + deficit.grantedPct.toFixed(2) + "%"
    );
  }

  return plan;
}

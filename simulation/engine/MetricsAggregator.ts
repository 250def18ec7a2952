import type { BaseElement } from '../nodes/BaseElement';
import type { ChannelStats, ElementSnapshot, PolicyStats, SimulationSnapshot } from '../types/simulation';
import type { EventScheduler } from './EventScheduler';
import type { MetricsCollector } from './MetricsCollector';
import type { MobilityEngine } from './MobilityEngine';

export class MetricsAggregator {
  computeSnapshot(params: {
    runId: string;
    scheduler: EventScheduler;
    metrics: MetricsCollector;
    elements: Iterable<BaseElement>;
    mobility?: MobilityEngine;
  }): SimulationSnapshot {
    const { runId, scheduler, metrics, elements, mobility } = params;

    const channels: Record<string, ChannelStats> = {};
    for (const channel of metrics.channels()) {
      channels[channel] = metrics.channelStats(channel);
    }

    const policies: PolicyStats = {
      created: metrics.get('policy.created'),
      distributed: metrics.get('policy.distributed'),
      received: metrics.get('policy.received'),
      rejected: metrics.get('policy.rejected'),
      enforced: metrics.get('policy.enforced'),
    };

    const snapshots: ElementSnapshot[] = [];
    for (const element of elements) {
      const position = mobility?.positionOf(element.id);
      snapshots.push({
        elementId: element.id,
        elementClass: element.elementClass,
        controllerId: element.controllerId,
        messagesReceived: element.messagesReceived,
        policiesApplied: element.appliedPolicies().length,
        ...(position ? { position: { ...position } } : {}),
      });
    }
    snapshots.sort((a, b) => a.elementId.localeCompare(b.elementId));

    return {
      runId,
      simTime: scheduler.now,
      scheduler: scheduler.stats(),
      channels,
      policies,
      mobilityTicks: metrics.get('mobility.ticks'),
      validationErrors: metrics.get('validation.errors'),
      elements: snapshots,
    };
  }
}

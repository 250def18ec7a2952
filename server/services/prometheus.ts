import type { SimulationSnapshot } from '../types.js';

export type PrometheusMode = 'pushgateway' | 'scrape' | 'both';

export interface PrometheusConfig {
  enabled: boolean;
  mode: PrometheusMode;
  pushgatewayUrl?: string;
  jobName: string;
}

interface MetricFamily {
  name: string;
  type: 'gauge' | 'counter';
  help: string;
  samples: string[];
}

function esc(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function line(name: string, labels: Record<string, string>, value: number): string {
  const labelText = Object.entries(labels)
    .map(([k, v]) => `${k}="${esc(v)}"`)
    .join(',');
  return `${name}{${labelText}} ${Number.isFinite(value) ? value : 0}`;
}

function family(name: string, type: MetricFamily['type'], help: string): MetricFamily {
  return { name, type, help, samples: [] };
}

const CHANNEL_OUTCOMES = ['sent', 'delivered', 'failed', 'dropped'] as const;
const POLICY_OPERATIONS = ['created', 'distributed', 'received', 'rejected', 'enforced'] as const;

// Families are emitted metric-major so every sample of one family follows its HELP/TYPE header.
export function toPrometheusText(runs: readonly SimulationSnapshot[]): string {
  const simTime = family('sim_time_seconds', 'gauge', 'Virtual clock of the run at snapshot time.');
  const events = family('sim_scheduler_events_total', 'counter', 'Scheduled callbacks executed.');
  const pending = family('sim_scheduler_pending_events', 'gauge', 'Events still queued at snapshot time.');
  const callbackErrors = family('sim_scheduler_callback_errors_total', 'counter', 'Callbacks that raised an error.');
  const channelMessages = family('sim_channel_messages_total', 'counter', 'Channel messages by outcome (sent|delivered|failed|dropped).');
  const policyOps = family('sim_policy_operations_total', 'counter', 'Policy lifecycle operations by kind.');
  const mobilityTicks = family('sim_mobility_ticks_total', 'counter', 'Position updates applied to mobile entities.');
  const validationErrors = family('sim_validation_errors_total', 'counter', 'Rejected policies, registrations and configs.');
  const elementInfo = family('sim_element_info', 'gauge', 'Static element identity labels for this run.');
  const elementMessages = family('sim_element_messages_received_total', 'counter', 'Messages delivered to each element.');
  const elementPolicies = family('sim_element_policies_applied_total', 'counter', 'Policy applications per element.');
  const elementPosition = family('sim_element_position', 'gauge', 'Last known element coordinate (axis=x|y).');

  for (const snapshot of runs) {
    const run = { run_id: snapshot.runId };
    simTime.samples.push(line(simTime.name, run, snapshot.simTime));
    events.samples.push(line(events.name, run, snapshot.scheduler.processed));
    pending.samples.push(line(pending.name, run, snapshot.scheduler.pending));
    callbackErrors.samples.push(line(callbackErrors.name, run, snapshot.scheduler.callbackErrors));
    mobilityTicks.samples.push(line(mobilityTicks.name, run, snapshot.mobilityTicks));
    validationErrors.samples.push(line(validationErrors.name, run, snapshot.validationErrors));

    for (const [channel, stats] of Object.entries(snapshot.channels)) {
      for (const outcome of CHANNEL_OUTCOMES) {
        channelMessages.samples.push(line(channelMessages.name, { ...run, channel, outcome }, stats[outcome]));
      }
    }

    for (const operation of POLICY_OPERATIONS) {
      policyOps.samples.push(line(policyOps.name, { ...run, operation }, snapshot.policies[operation]));
    }

    for (const element of snapshot.elements) {
      const common = { ...run, element_id: element.elementId, element_class: element.elementClass };
      elementInfo.samples.push(line(elementInfo.name, { ...common, controller_id: element.controllerId ?? 'none' }, 1));
      elementMessages.samples.push(line(elementMessages.name, common, element.messagesReceived));
      elementPolicies.samples.push(line(elementPolicies.name, common, element.policiesApplied));
      if (element.position) {
        elementPosition.samples.push(line(elementPosition.name, { ...common, axis: 'x' }, element.position.x));
        elementPosition.samples.push(line(elementPosition.name, { ...common, axis: 'y' }, element.position.y));
      }
    }
  }

  const out: string[] = [];
  for (const metric of [
    simTime,
    events,
    pending,
    callbackErrors,
    channelMessages,
    policyOps,
    mobilityTicks,
    validationErrors,
    elementInfo,
    elementMessages,
    elementPolicies,
    elementPosition
  ]) {
    out.push(`# HELP ${metric.name} ${metric.help}`, `# TYPE ${metric.name} ${metric.type}`, ...metric.samples);
  }
  return `${out.join('\n')}\n`;
}

export function shouldPushToGateway(config: PrometheusConfig): boolean {
  return config.enabled && (config.mode === 'pushgateway' || config.mode === 'both');
}

export function shouldExposeScrape(config: PrometheusConfig): boolean {
  return config.enabled && (config.mode === 'scrape' || config.mode === 'both');
}

export async function pushSnapshotToPushgateway(
  snapshot: SimulationSnapshot,
  pushgatewayUrl: string,
  jobName = 'ran_simulation'
): Promise<void> {
  const url = `${pushgatewayUrl}/metrics/job/${encodeURIComponent(jobName)}/run_id/${encodeURIComponent(snapshot.runId)}`;
  const res = await fetch(url, {
    method: 'PUT',
    headers: { 'Content-Type': 'text/plain; version=0.0.4' },
    body: toPrometheusText([snapshot])
  });
  if (!res.ok) throw new Error(`Pushgateway push failed (${res.status})`);
}

export async function checkPushgateway(pushgatewayUrl: string): Promise<'connected' | 'error'> {
  try {
    const res = await fetch(`${pushgatewayUrl}/-/healthy`);
    if (res.ok) return 'connected';

    // Some Pushgateway deployments don't expose /-/healthy.
    const fallback = await fetch(pushgatewayUrl);
    return fallback.ok ? 'connected' : 'error';
  } catch (err) {
    console.error('[health] pushgateway unreachable:', err);
    return 'error';
  }
}

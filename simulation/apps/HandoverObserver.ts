import type { LocalController } from '../control/LocalController';
import type { Logger } from '../engine/Logger';
import type { Indication } from '../types/messages';

export interface HandoverObserverOptions {
  successThreshold?: number;
  minAttempts?: number;
  hysteresisStep?: number;
  timeToTriggerStep?: number;
}

// Watches handover reports from the elements of one local controller.
// A cell with enough attempts and a success rate under the threshold gets its handover
// hysteresis and time-to-trigger lowered by one step each.
export class HandoverObserver {
  readonly id: string;
  private readonly controller: LocalController;
  private readonly logger: Logger;
  private readonly successThreshold: number;
  private readonly minAttempts: number;
  private readonly hysteresisStep: number;
  private readonly timeToTriggerStep: number;
  adjustments = 0;

  constructor(id: string, controller: LocalController, logger: Logger, options: HandoverObserverOptions = {}) {
    this.id = id;
    this.controller = controller;
    this.logger = logger.child(`observer:${id}`);
    this.successThreshold = options.successThreshold ?? 0.9;
    this.minAttempts = options.minAttempts ?? 10;
    this.hysteresisStep = options.hysteresisStep ?? 1;
    this.timeToTriggerStep = options.timeToTriggerStep ?? 5;
  }

  register(): boolean {
    return this.controller.addObserver(this.id, this.onIndication);
  }

  unregister(): boolean {
    return this.controller.removeObserver(this.id);
  }

  private readonly onIndication = (indication: Indication, originId: string): void => {
    if (indication.messageType !== 'HANDOVER_REPORT') {
      return;
    }
    const { attempts, successRate } = indication.payload;
    if (typeof attempts !== 'number' || typeof successRate !== 'number') {
      this.logger.warn(`malformed handover report from ${originId}`);
      return;
    }
    if (attempts < this.minAttempts || successRate >= this.successThreshold) {
      return;
    }

    this.logger.info(`success rate ${successRate.toFixed(2)} on ${indication.elementId}; adjusting handover parameters`);
    this.controller.sendControl(
      {
        messageType: 'HANDOVER_PARAMETER_ADJUSTMENT',
        payload: {
          actions: [
            { parameter: 'hysteresis', value: -this.hysteresisStep },
            { parameter: 'timeToTrigger', value: -this.timeToTriggerStep },
          ],
        },
      },
      indication.elementId,
    );
    this.adjustments += 1;
  };
}

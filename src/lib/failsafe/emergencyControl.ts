/**
 * Emergency Control
 *
 * Two independent kill switches. The emergency stop outranks every other
 * check; the pause switch is checked right after it. Either can be set by
 * the `emergency` role, only `admin` can clear them.
 *
 * The system must FAIL CLOSED: nothing here ever lifts a switch on its own.
 */

import type { AccessControl } from '../access/accessControl';
import type { AgentEmitter } from '../agent/events';
import { ErrorCode, TradingError } from '../errors';
import type { EmergencyState } from '../types';
import { createLogger } from '../utils/logger';
import { nowSeconds } from '../utils/time';

const log = createLogger('EmergencyControl');

export class EmergencyControl {
  private state: EmergencyState = {
    emergencyStop: false,
    emergencyStopTimestamp: 0,
    emergencyReason: null,
    paused: false,
  };

  constructor(
    private readonly access: AccessControl,
    private readonly events: AgentEmitter
  ) {}

  getState(): EmergencyState {
    return { ...this.state };
  }

  get stopped(): boolean {
    return this.state.emergencyStop;
  }

  get paused(): boolean {
    return this.state.paused;
  }

  activate(actor: string, reason: string): void {
    this.access.requireRole(actor, 'emergency');

    const timestamp = nowSeconds();
    this.state.emergencyStop = true;
    this.state.emergencyStopTimestamp = timestamp;
    this.state.emergencyReason = reason;

    log.warn({ actor, reason }, 'Emergency stop activated');
    this.events.emit('emergency-activated', { actor, reason, timestamp });
  }

  deactivate(actor: string): void {
    this.access.requireRole(actor, 'admin');

    this.state.emergencyStop = false;
    this.state.emergencyReason = null;

    log.info({ actor }, 'Emergency stop deactivated');
    this.events.emit('emergency-deactivated', { actor, timestamp: nowSeconds() });
  }

  pause(actor: string): void {
    this.access.requireRole(actor, 'emergency');

    this.state.paused = true;
    log.warn({ actor }, 'Trading paused');
    this.events.emit('paused', { actor, timestamp: nowSeconds() });
  }

  unpause(actor: string): void {
    this.access.requireRole(actor, 'admin');

    this.state.paused = false;
    log.info({ actor }, 'Trading unpaused');
    this.events.emit('unpaused', { actor, timestamp: nowSeconds() });
  }

  /** Reason the switches block trading, or null when they don't. */
  blockReason(): { code: ErrorCode; message: string } | null {
    if (this.state.emergencyStop) {
      return { code: ErrorCode.EMERGENCY_STOP_ACTIVE, message: 'Emergency stop active' };
    }
    if (this.state.paused) {
      return { code: ErrorCode.CONTRACT_PAUSED, message: 'Contract paused' };
    }
    return null;
  }

  assertTradingAllowed(): void {
    const blocked = this.blockReason();
    if (blocked) {
      throw new TradingError(blocked.code, blocked.message, {
        emergencyReason: this.state.emergencyReason,
      });
    }
  }
}

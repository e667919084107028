import { Logger } from './logger.js';

export enum DeviceState {
  DISCONNECTED = 'DISCONNECTED',
  CONNECTING = 'CONNECTING',
  CONNECTED = 'CONNECTED',
  LOST = 'LOST'
}

interface StateTransition {
  from: DeviceState;
  to: DeviceState;
}

const VALID_TRANSITIONS: readonly StateTransition[] = [
  { from: DeviceState.DISCONNECTED, to: DeviceState.CONNECTING },
  { from: DeviceState.CONNECTING, to: DeviceState.CONNECTED },
  { from: DeviceState.CONNECTING, to: DeviceState.DISCONNECTED },
  { from: DeviceState.CONNECTED, to: DeviceState.DISCONNECTED },
  { from: DeviceState.CONNECTED, to: DeviceState.LOST },
  { from: DeviceState.LOST, to: DeviceState.CONNECTING },
  { from: DeviceState.LOST, to: DeviceState.DISCONNECTED }
];

export class StateMachine {
  private currentState: DeviceState = DeviceState.DISCONNECTED;
  private logger: Logger;
  
  constructor(name = 'StateMachine') {
    this.logger = new Logger(name);
  }
  
  getState(): DeviceState {
    return this.currentState;
  }
  
  canTransition(to: DeviceState): boolean {
    return VALID_TRANSITIONS.some(t => t.from === this.currentState && t.to === to);
  }
  
  transition(to: DeviceState, context?: string): void {
    const from = this.currentState;
    
    if (!this.canTransition(to)) {
      const error = `Invalid state transition: ${from} -> ${to}`;
      this.logger.error(error);
      throw new Error(error);
    }
    
    this.currentState = to;
    this.logger.debug(`State transition: ${from} -> ${to}${context ? ` (${context})` : ''}`);
  }
  
  reset(): void {
    this.logger.debug('Resetting state machine to DISCONNECTED');
    this.currentState = DeviceState.DISCONNECTED;
  }
}

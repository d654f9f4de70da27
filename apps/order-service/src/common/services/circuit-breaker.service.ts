import { Injectable, Logger } from '@nestjs/common';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  /** How long an open circuit rejects calls before letting a trial call through, in ms. */
  timeout: number;
  successThreshold: number;
}

interface Circuit {
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: number;
}

export class CircuitOpenError extends Error {
  constructor(readonly circuit: string) {
    super(`Circuit breaker ${circuit} is OPEN - operation blocked`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * One breaker per named downstream (catalog, identity, ...), so a failing
 * collaborator does not trip calls to a healthy one.
 */
@Injectable()
export class CircuitBreakerService {
  private readonly logger = new Logger(CircuitBreakerService.name);
  private readonly circuits = new Map<string, Circuit>();

  private readonly defaultOptions: CircuitBreakerOptions = {
    failureThreshold: 5,
    timeout: 60000,
    successThreshold: 3,
  };

  async execute<T>(
    name: string,
    operation: () => Promise<T>,
    options: Partial<CircuitBreakerOptions> = {},
  ): Promise<T> {
    const config = { ...this.defaultOptions, ...options };
    const circuit = this.getCircuit(name);

    if (circuit.state === CircuitState.OPEN) {
      if (Date.now() - circuit.lastFailureTime >= config.timeout) {
        circuit.state = CircuitState.HALF_OPEN;
        this.logger.log(`Circuit ${name} transitioning to HALF_OPEN`);
      } else {
        throw new CircuitOpenError(name);
      }
    }

    try {
      const result = await operation();
      this.onSuccess(name, circuit, config);
      return result;
    } catch (error) {
      this.onFailure(name, circuit, config);
      throw error;
    }
  }

  private getCircuit(name: string): Circuit {
    let circuit = this.circuits.get(name);
    if (!circuit) {
      circuit = { state: CircuitState.CLOSED, failureCount: 0, successCount: 0, lastFailureTime: 0 };
      this.circuits.set(name, circuit);
    }
    return circuit;
  }

  private onSuccess(name: string, circuit: Circuit, options: CircuitBreakerOptions): void {
    circuit.failureCount = 0;
    circuit.lastFailureTime = 0;

    if (circuit.state === CircuitState.HALF_OPEN) {
      circuit.successCount++;
      if (circuit.successCount >= options.successThreshold) {
        circuit.state = CircuitState.CLOSED;
        circuit.successCount = 0;
        this.logger.log(`Circuit ${name} transitioning to CLOSED`);
      }
    }
  }

  private onFailure(name: string, circuit: Circuit, options: CircuitBreakerOptions): void {
    circuit.failureCount++;
    circuit.lastFailureTime = Date.now();

    if (circuit.state === CircuitState.HALF_OPEN) {
      circuit.state = CircuitState.OPEN;
      circuit.successCount = 0;
      this.logger.warn(`Circuit ${name} transitioning to OPEN (from HALF_OPEN)`);
    } else if (circuit.failureCount >= options.failureThreshold) {
      circuit.state = CircuitState.OPEN;
      this.logger.warn(`Circuit ${name} transitioning to OPEN`);
    }
  }

  getState(name: string): CircuitState {
    return this.circuits.get(name)?.state ?? CircuitState.CLOSED;
  }

  reset(name?: string): void {
    if (name) {
      this.circuits.delete(name);
    } else {
      this.circuits.clear();
    }
    this.logger.log(`Circuit breaker ${name ?? '(all)'} manually reset`);
  }
}

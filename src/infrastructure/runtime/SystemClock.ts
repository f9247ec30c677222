import { IClock } from '../../domain/interfaces';

export class SystemClock implements IClock {
  now(): number {
    return Date.now();
  }
}

/*
 * RegistrationStore
 * -----------------
 * Maps canonical token ids to the registration answering for them, in
 * registration order. All mutation happens via `add()`; there is no removal
 * API, since a container stops accepting registrations once it is locked.
 */
import { RegistrationCollisionError } from '../errors/errors.js';
import type { Registration } from './registration.js';
import type { CanonicalId, Token } from './token.js';

export class RegistrationStore {
  private readonly registrations = new Map<CanonicalId, Registration>();

  get(token: Token): Registration | undefined {
    return this.registrations.get(token.id);
  }

  /**
   * @throws RegistrationCollisionError if the token is already registered
   */
  add(registration: Registration, containerName: string): void {
    const { serviceType } = registration;
    if (this.registrations.has(serviceType.id)) {
      throw new RegistrationCollisionError(serviceType.label, containerName);
    }
    this.registrations.set(serviceType.id, registration);
  }

  values(): Registration[] {
    return [...this.registrations.values()];
  }
}

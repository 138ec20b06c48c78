import { createHash, timingSafeEqual } from 'crypto';
import { Inject, Injectable } from '@nestjs/common';

import { APP_CONFIG, AppConfig, Credential } from '../config/app-config';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/** The fixed set of users allowed to sign in. */
@Injectable()
export class CredentialStore {
  private readonly credentials: readonly Credential[];

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.credentials = config.auth.credentials;
  }

  /** Compares every entry in constant time, so timing reveals neither names nor passwords. */
  verify(username: string, password: string): boolean {
    const user = digest(username);
    const pass = digest(password);
    let matched = false;
    for (const credential of this.credentials) {
      const userMatches = timingSafeEqual(digest(credential.username), user);
      const passMatches = timingSafeEqual(digest(credential.password), pass);
      matched = (userMatches && passMatches) || matched;
    }
    return matched;
  }
}

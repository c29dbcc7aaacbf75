import { APP_VERSION } from '../config.js';
import type { JoinInvitation, Session } from '../types.js';

export function createInvitation(session: Session, port: number): JoinInvitation {
  return {
    type: 'focusroom-invite',
    version: APP_VERSION,
    authorityAddress: session.authorityAddress,
    port,
    sessionCode: session.code,
    password: session.password,
  };
}

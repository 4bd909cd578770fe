import { ConnectionConfig, RemoteSessionOptions } from '../interfaces';
import { RemoteSession } from './remote-session';

/**
 * @description Open a session, hand it to `fn`, and always disconnect afterwards. Nothing is kept globally.
 */
export async function withSession<T>(
  config: Readonly<ConnectionConfig>,
  fn: (session: RemoteSession) => Promise<T>,
  options: RemoteSessionOptions = {}
): Promise<T> {
  const session = new RemoteSession(config, options);
  await session.connect();

  try {
    return await fn(session);
  } finally {
    await session.disconnect();
  }
}

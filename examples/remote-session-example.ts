import { RemoteSession } from '../src/core/RemoteSession.js';
import { isSessionError } from '../src/core/SessionError.js';

async function demonstrateRemoteSession() {
  const options = {
    host: process.env.REMOTE_HOST || '192.168.1.10',
    username: process.env.REMOTE_USER || 'deploy',
    privateKeyPath: process.env.REMOTE_KEY || `${process.env.HOME}/.ssh/id_rsa`,
  };

  try {
    console.log('=== Remote Session Demo ===\n');

    await RemoteSession.withSession(options, async (session) => {
      console.log(`1. ${session.toString()}`);

      const liveness = await session.isAlive();
      console.log(`2. Liveness: ${liveness.alive}`, liveness.reasons);

      console.log('\n3. Streaming a short command...');
      const result = await session.execute('uname -a && ls -la /tmp | head -5');
      console.log(`   exit code ${result.exitCode}`);

      console.log('\n4. Running a detached command...');
      const long = await session.executeLong('for i in 1 2 3; do echo "step $i"; sleep 1; done', {
        onLine: (line) => console.log(`   [remote] ${line.trimEnd()}`),
        pollInterval: 500,
      });
      console.log(`   finished with exit code ${long.exitCode}`);

      const boot = await session.snapshotBootIdentity();
      console.log('\n5. Boot identity:', boot);
    });
  } catch (error) {
    if (isSessionError(error)) {
      console.error(`Session error (${error.kind}): ${error.message}`);
    } else {
      console.error('Demo failed:', error);
    }
    process.exitCode = 1;
  }
}

demonstrateRemoteSession().catch(console.error);

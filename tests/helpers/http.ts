import { once } from 'events';
import type { Express } from 'express';

export interface TestServer {
    url: string;
    close(): Promise<void>;
}

/**
 * Serve an app on an ephemeral loopback port for the duration of a test
 */
export async function startTestServer(app: Express): Promise<TestServer> {
    const server = app.listen(0, '127.0.0.1');
    await once(server, 'listening');

    const address = server.address();
    if (address === null || typeof address === 'string') {
        server.close();
        throw new Error('Test server has no TCP address');
    }

    return {
        url: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>((resolve, reject) => {
            server.close(error => (error ? reject(error) : resolve()));
        })
    };
}

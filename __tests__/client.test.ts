import http from 'http';
import { HttpResponse, LichessClient, parseCurrentGame } from '../src/lichess/client';

const payload = {
  id: 'g1',
  speed: 'Blitz',
  opponent: { username: 'bob' },
  players: { white: { user: { name: 'Alice' } }, black: { user: { name: 'bob' } } }
};

function clientReturning(res: HttpResponse) {
  const urls: string[] = [];
  const client = new LichessClient('https://lichess.org', {
    get: async url => {
      urls.push(url);
      return res;
    }
  });
  return { client, urls };
}

describe('parseCurrentGame', () => {
  it('extracts the game of the queried player', () => {
    expect(parseCurrentGame('Alice', payload)).toEqual({
      playerId: 'alice',
      gameId: 'g1',
      opponent: 'bob',
      speed: 'blitz',
      color: 'white',
      url: 'https://lichess.org/g1'
    });
  });

  it('assigns black when the queried player is not white', () => {
    expect(parseCurrentGame('bob', payload)?.color).toBe('black');
  });

  it('defaults a missing opponent name', () => {
    expect(parseCurrentGame('alice', { ...payload, opponent: { ai: 3 } })?.opponent).toBe('Unknown');
  });

  it('skips payloads without id or opponent', () => {
    expect(parseCurrentGame('alice', { ...payload, id: undefined })).toBeNull();
    expect(parseCurrentGame('alice', { id: 'g1', speed: 'blitz' })).toBeNull();
    expect(parseCurrentGame('alice', 'not an object')).toBeNull();
  });

  it('builds links on the configured host', () => {
    expect(parseCurrentGame('alice', payload, 'http://localhost:9663')?.url).toBe('http://localhost:9663/g1');
  });
});

describe('LichessClient', () => {
  it('requests the current game of one player', async () => {
    const { client, urls } = clientReturning({ status: 200, data: payload });
    const result = await client.fetchCurrentGame('alice');
    expect(urls).toEqual(['/api/user/alice/current-game']);
    expect(result).toEqual({
      kind: 'active',
      status: {
        playerId: 'alice',
        gameId: 'g1',
        opponent: 'bob',
        speed: 'blitz',
        color: 'white',
        url: 'https://lichess.org/g1'
      }
    });
  });

  it('encodes the player id in the path', async () => {
    const { client, urls } = clientReturning({ status: 404, data: null });
    await client.fetchCurrentGame('a/b');
    expect(urls).toEqual(['/api/user/a%2Fb/current-game']);
  });

  it('treats non-200 responses as no active game', async () => {
    const { client } = clientReturning({ status: 404, data: { error: 'No current game' } });
    await expect(client.fetchCurrentGame('alice')).resolves.toEqual({ kind: 'none' });
  });

  it('treats malformed payloads as no active game', async () => {
    const { client } = clientReturning({ status: 200, data: { speed: 'blitz' } });
    await expect(client.fetchCurrentGame('alice')).resolves.toEqual({ kind: 'none' });
  });

  it('propagates transport errors', async () => {
    const client = new LichessClient('https://lichess.org', {
      get: async () => {
        throw new Error('ECONNRESET');
      }
    });
    await expect(client.fetchCurrentGame('alice')).rejects.toThrow('ECONNRESET');
  });
});

describe('LichessClient over HTTP', () => {
  let server: http.Server;
  let baseUrl: string;
  const accepts: Array<string | undefined> = [];

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      accepts.push(req.headers.accept);
      if (req.url === '/api/user/alice/current-game') {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(payload));
      } else if (req.url === '/api/user/stuck/current-game') {
        // never answers
      } else {
        res.writeHead(404, { 'Content-Type': 'application/json' });
        res.end('{"error":"No current game"}');
      }
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server did not bind a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise(resolve => server.close(resolve));
  });

  it('asks for JSON and reads an active game', async () => {
    const client = new LichessClient(baseUrl);
    await expect(client.fetchCurrentGame('alice')).resolves.toEqual({
      kind: 'active',
      status: {
        playerId: 'alice',
        gameId: 'g1',
        opponent: 'bob',
        speed: 'blitz',
        color: 'white',
        url: `${baseUrl}/g1`
      }
    });
    expect(accepts[accepts.length - 1]).toBe('application/json');
  });

  it('resolves a 404 to no active game', async () => {
    await expect(new LichessClient(baseUrl).fetchCurrentGame('carol')).resolves.toEqual({ kind: 'none' });
  });

  it('gives up on a server that never answers', async () => {
    const client = new LichessClient(baseUrl, { timeoutMs: 200 });
    await expect(client.fetchCurrentGame('stuck')).rejects.toMatchObject({ code: 'ECONNABORTED' });
  });
});

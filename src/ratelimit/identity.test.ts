import pino from 'pino';
import { deriveClientKey, networkKeyOf, UNKNOWN_CLIENT, userKeyOf } from './identity';

const verify = (token: string) => (token === 'good-token' ? 'user-1' : undefined);

describe('networkKeyOf', () => {
    it('uses the first X-Forwarded-For hop', () => {
        const req = {
            headers: { 'x-forwarded-for': '203.0.113.7, 10.0.0.1', 'x-real-ip': '198.51.100.2' },
            socket: { remoteAddress: '127.0.0.1' },
        };
        expect(networkKeyOf(req)).toBe('203.0.113.7');
    });

    it('falls back to X-Real-IP, then the peer address', () => {
        expect(networkKeyOf({ headers: { 'x-real-ip': ' 198.51.100.2 ' } })).toBe('198.51.100.2');
        expect(networkKeyOf({ headers: { 'x-forwarded-for': ' , 10.0.0.1', 'x-real-ip': '198.51.100.2' } })).toBe(
            '198.51.100.2',
        );
        expect(networkKeyOf({ headers: {}, socket: { remoteAddress: '127.0.0.1' } })).toBe('127.0.0.1');
    });

    it('uses the shared bucket when nothing identifies the client', () => {
        expect(networkKeyOf({ headers: {} })).toBe(UNKNOWN_CLIENT);
        expect(networkKeyOf({ headers: { 'x-real-ip': '   ' }, socket: {} })).toBe('unknown');
    });
});

describe('userKeyOf', () => {
    it('returns the verified subject of a bearer token', () => {
        expect(userKeyOf({ headers: { authorization: 'Bearer good-token' } }, verify)).toBe('user-1');
    });

    it('ignores other schemes and unverifiable tokens', () => {
        expect(userKeyOf({ headers: { authorization: 'Basic good-token' } }, verify)).toBeUndefined();
        expect(userKeyOf({ headers: { authorization: 'Bearer forged' } }, verify)).toBeUndefined();
        expect(userKeyOf({ headers: { authorization: 'Bearer ' } }, verify)).toBeUndefined();
        expect(userKeyOf({ headers: {} }, verify)).toBeUndefined();
    });
});

describe('deriveClientKey', () => {
    it('combines both dimensions', () => {
        const req = { headers: { authorization: 'Bearer good-token', 'x-real-ip': '198.51.100.2' } };
        expect(deriveClientKey(req, verify)).toEqual({ network: '198.51.100.2', user: 'user-1' });
        expect(deriveClientKey({ headers: {} }, verify)).toEqual({ network: 'unknown' });
    });

    it('falls back to the network key when the verifier throws', () => {
        const lines: string[] = [];
        const log = pino({ level: 'warn' }, { write: (line: string) => lines.push(line) });
        const failing = () => {
            throw new Error('key store offline');
        };

        const key = deriveClientKey({ headers: { authorization: 'Bearer good-token', 'x-real-ip': '198.51.100.2' } }, failing, log);

        expect(key).toEqual({ network: '198.51.100.2' });
        expect(lines).toHaveLength(1);
        expect(JSON.parse(lines[0])).toMatchObject({ level: 40, msg: 'could not derive user key, checking network only' });
    });
});

import express from 'express';
import type { Request, Response, RequestHandler, NextFunction } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server } from 'http';
import { LedgerPlatform } from '../Platform/LedgerPlatform.js';
import { translateError, ValidationError, NotFoundError } from '../Platform/Errors.js';
import { systemClock } from '../Platform/Ports.js';
import type { ISystemClock } from '../Platform/Ports.js';
import type { CallContext } from '../kernel-core/L0/Primitives.js';
import { ErrorCode } from '../kernel-core/Errors.js';
import type { ContentInput } from '../Contracts/ContentRegistry/ContentRegistry.js';

// --- Request readers ---

function param(req: Request, name: string): string {
    const value = req.params[name];
    if (value === undefined || value === '') throw new ValidationError(`Missing path parameter: ${name}`);
    return value;
}

function integer(raw: unknown, name: string): number {
    const value = typeof raw === 'string' && /^\d+$/.test(raw) ? Number(raw) : raw;
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
        throw new ValidationError(`${name} must be a non-negative integer`);
    }
    return value;
}

function amount(raw: unknown, name: string): bigint {
    if (typeof raw === 'number' && Number.isSafeInteger(raw) && raw >= 0) return BigInt(raw);
    if (typeof raw === 'string' && /^\d+$/.test(raw)) return BigInt(raw);
    throw new ValidationError(`${name} must be a non-negative integer (decimal string for large values)`);
}

function field(body: unknown, name: string): unknown {
    if (typeof body !== 'object' || body === null) throw new ValidationError('Request body must be a JSON object');
    return Reflect.get(body, name);
}

function text(body: unknown, name: string): string {
    const value = field(body, name);
    if (typeof value !== 'string') throw new ValidationError(`${name} must be a string`);
    return value;
}

function flag(body: unknown, name: string): boolean {
    const value = field(body, name);
    if (typeof value !== 'boolean') throw new ValidationError(`${name} must be a boolean`);
    return value;
}

/** body-parser rejects unreadable bodies with a 4xx `status` on the error. */
function bodyError(e: unknown): ValidationError | undefined {
    if (!(e instanceof Error)) return undefined;
    const status: unknown = Reflect.get(e, 'status');
    if (typeof status !== 'number' || status < 400 || status >= 500) return undefined;
    return new ValidationError(Reflect.get(e, 'type') === 'entity.parse.failed' ? 'Malformed JSON body' : e.message);
}

function content(body: unknown): ContentInput {
    return { label: text(body, 'label'), uri: text(body, 'uri'), tag: text(body, 'tag') };
}

export class LedgerServer {
    public readonly app: express.Express;
    private server?: Server;

    constructor(private platform: LedgerPlatform, private clock: ISystemClock = systemClock) {
        this.app = express();
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
    }

    public async start(port: number): Promise<number> {
        if (!this.platform.isBooted) {
            console.log('[LedgerServer] Replaying journal...');
            await this.platform.boot();
        }

        return await new Promise<number>((resolve, reject) => {
            const server = this.app.listen(port, () => {
                const address = server.address();
                const bound = typeof address === 'object' && address !== null ? address.port : port;
                console.log(`[LedgerServer] Listening on port ${bound}`);
                resolve(bound);
            });
            server.on('error', reject);
            this.server = server;
        });
    }

    public async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;
        this.server = undefined;
        await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
    }

    private context(req: Request): CallContext {
        const caller = req.header('x-caller');
        if (!caller) throw new ValidationError('Missing x-caller header');
        const value = req.header('x-call-value');
        return {
            caller,
            value: value === undefined ? 0n : amount(value, 'x-call-value'),
            timestamp: this.clock.now()
        };
    }

    private route(handler: (req: Request) => Promise<unknown> | unknown, status: number = 200): RequestHandler {
        return (req: Request, res: Response) => {
            Promise.resolve()
                .then(() => handler(req))
                .then(body => { res.status(status).json(body); })
                .catch((e: unknown) => this.fail(req, res, e));
        };
    }

    private fail(req: Request, res: Response, e: unknown): void {
        const err = translateError(e);
        if (err.httpStatus >= 500) console.error(`[LedgerServer] ${req.method} ${req.url} failed: ${err.message}`);
        res.status(err.httpStatus).json({ error: err.code, message: err.message });
    }

    private setupRoutes() {
        const { blocks, registry, token, audit } = this.platform;

        this.app.get('/health', this.route(() => ({ status: 'ok', integrity: this.platform.verifyIntegrity() })));

        // --- Evolving blocks ---
        this.app.post('/blocks', this.route(async req => {
            const blockId = await blocks.create(this.context(req));
            return blocks.getBlock(blockId);
        }, 201));

        this.app.post('/blocks/merge', this.route(async req => {
            const blockId = await blocks.merge(this.context(req), integer(field(req.body, 'a'), 'a'), integer(field(req.body, 'b'), 'b'));
            return blocks.getBlock(blockId);
        }, 201));

        this.app.get('/blocks/:id', this.route(req => {
            const id = integer(param(req, 'id'), 'id');
            const block = blocks.getBlock(id);
            if (!block) throw new NotFoundError(`Block ${id} not found`);
            return { ...block, timeUntilEvolution: blocks.timeUntilEvolution(id, this.clock.now()) };
        }));

        this.app.post('/blocks/:id/evolve', this.route(req =>
            blocks.evolve(this.context(req), integer(param(req, 'id'), 'id'))));

        this.app.get('/owners/:address/blocks', this.route(req => {
            const address = param(req, 'address');
            return { owner: address, blockIds: blocks.getBlocksOf(address) };
        }));

        // --- Content registry ---
        this.app.post('/registry/entries', this.route(req =>
            registry.createBlock(this.context(req), text(req.body, 'key'), content(req.body)), 201));

        this.app.post('/registry/entries/:key/versions', this.route(req =>
            registry.createNewVersion(this.context(req), param(req, 'key'), content(req.body)), 201));

        this.app.get('/registry/entries/:key', this.route(req => {
            const key = param(req, 'key');
            const latest = registry.getLatestVersion(key);
            if (!latest) throw new NotFoundError(`Key ${key} not found`, ErrorCode.KEY_NOT_FOUND);
            return { key, latest, versionIds: registry.getVersionsOf(key) };
        }));

        this.app.get('/registry/versions/:id', this.route(req => {
            const id = integer(param(req, 'id'), 'id');
            const version = registry.getVersion(id);
            if (!version) throw new NotFoundError(`Version ${id} not found`);
            return version;
        }));

        this.app.put('/registry/versions/:id/active', this.route(async req => {
            const id = integer(param(req, 'id'), 'id');
            await registry.setVersionActive(this.context(req), id, flag(req.body, 'active'));
            return registry.getVersion(id);
        }));

        // --- Token ---
        this.app.get('/token', this.route(() => ({
            ...token.metadata(),
            totalSupply: token.totalSupply().toString(),
            owner: token.owner()
        })));

        this.app.get('/token/balances/:address', this.route(req => {
            const address = param(req, 'address');
            return { address, balance: token.balanceOf(address).toString() };
        }));

        this.app.get('/token/allowances/:owner/:spender', this.route(req => {
            const owner = param(req, 'owner');
            const spender = param(req, 'spender');
            return { owner, spender, allowance: token.allowance(owner, spender).toString() };
        }));

        this.app.post('/token/transfer', this.route(async req => {
            const ctx = this.context(req);
            await token.transfer(ctx, text(req.body, 'to'), amount(field(req.body, 'amount'), 'amount'));
            return { from: ctx.caller, balance: token.balanceOf(ctx.caller).toString() };
        }));

        this.app.post('/token/approve', this.route(async req => {
            const ctx = this.context(req);
            const spender = text(req.body, 'spender');
            await token.approve(ctx, spender, amount(field(req.body, 'amount'), 'amount'));
            return { owner: ctx.caller, spender, allowance: token.allowance(ctx.caller, spender).toString() };
        }));

        this.app.post('/token/transfer-from', this.route(async req => {
            const ctx = this.context(req);
            const from = text(req.body, 'from');
            await token.transferFrom(ctx, from, text(req.body, 'to'), amount(field(req.body, 'amount'), 'amount'));
            return { from, balance: token.balanceOf(from).toString(), allowance: token.allowance(from, ctx.caller).toString() };
        }));

        this.app.post('/token/mint', this.route(async req => {
            await token.mint(this.context(req), text(req.body, 'to'), amount(field(req.body, 'amount'), 'amount'));
            return { totalSupply: token.totalSupply().toString() };
        }));

        this.app.post('/token/burn', this.route(async req => {
            await token.burn(this.context(req), text(req.body, 'from'), amount(field(req.body, 'amount'), 'amount'));
            return { totalSupply: token.totalSupply().toString() };
        }));

        // --- Journal ---
        this.app.get('/events', this.route(() => audit.getHistory()));

        // Errors raised outside a route, such as an unparseable body
        this.app.use((e: unknown, req: Request, res: Response, next: NextFunction) => {
            if (res.headersSent) {
                next(e);
                return;
            }
            this.fail(req, res, bodyError(e) ?? e);
        });
    }
}

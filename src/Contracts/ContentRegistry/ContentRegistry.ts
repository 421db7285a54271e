import { Contract, argBoolean, argNumber, argString, unknownOperation } from '../../kernel-core/L4/Contract.js';
import type { Invariant } from '../../kernel-core/L0/Invariants.js';
import { idsBelowCounter, indexResolves } from '../../kernel-core/L0/Invariants.js';
import type { Address, CallArgs, CallContext } from '../../kernel-core/L0/Primitives.js';
import { own, appendIndex } from '../../kernel-core/L0/Primitives.js';
import { enforce, requireEntity, CreatorGuard, KeyGuard, IdGuard } from '../../kernel-core/L0/Guards.js';
import { transferOwnership } from '../../kernel-core/L1/Ownership.js';
import type { Emit } from '../../kernel-core/L2/State.js';
import { AuditLog } from '../../kernel-core/L5/Audit.js';
import { ErrorCode, LedgerError } from '../../kernel-core/Errors.js';

export interface ContentVersion {
    readonly versionId: number;
    readonly key: string;
    readonly version: number;
    readonly label: string;
    readonly contentURI: string;
    readonly tag: string;
    readonly creator: Address;
    readonly createdAt: number;
    readonly isActive: boolean;
}

export interface ContentInput {
    label: string;
    uri: string;
    tag: string;
}

export interface RegistryState {
    readonly owner: Address;
    readonly nextVersionId: number;
    readonly versions: Readonly<Record<string, ContentVersion>>;
    /** A key without an entry has never been created. */
    readonly latestVersionId: Readonly<Record<string, number>>;
    readonly versionsByKey: Readonly<Record<string, readonly number[]>>;
    readonly versionsByCreator: Readonly<Record<Address, readonly number[]>>;
}

/**
 * Version numbers under each key run 1..n in id order, and the latest
 * pointer names the last of them.
 */
function keyHistoryConsistent(s: RegistryState): boolean {
    return Object.entries(s.versionsByKey).every(([key, ids]) => {
        const numbered = ids.every((id, i) => {
            const v = own(s.versions, String(id));
            return v !== undefined && v.key === key && v.version === i + 1;
        });
        return numbered && own(s.latestVersionId, key) === ids[ids.length - 1];
    });
}

export const REGISTRY_INVARIANTS: Invariant<RegistryState>[] = [
    {
        id: 'REG-01',
        boundary: 'Identity Uniqueness',
        description: 'Version ids are below the next id to allocate',
        predicate: s => idsBelowCounter(s.versions, s.nextVersionId)
    },
    {
        id: 'REG-02',
        boundary: 'Version Ordering',
        description: 'Versions under a key are numbered 1..n and latest points at n',
        predicate: keyHistoryConsistent
    },
    {
        id: 'REG-03',
        boundary: 'Index Consistency',
        description: 'Every latest pointer has a key history',
        predicate: s => Object.keys(s.latestVersionId).every(key => own(s.versionsByKey, key) !== undefined)
    },
    {
        id: 'REG-04',
        boundary: 'Index Consistency',
        description: 'Creator index entries resolve to versions',
        predicate: s => indexResolves(s.versionsByCreator, s.versions)
    }
];

export class ContentRegistry extends Contract<RegistryState> {
    constructor(params: { owner: Address }, audit?: AuditLog) {
        super('registry', {
            owner: params.owner,
            nextVersionId: 1,
            versions: {},
            latestVersionId: {},
            versionsByKey: {},
            versionsByCreator: {}
        }, REGISTRY_INVARIANTS, audit);
    }

    public createBlock(ctx: CallContext, key: string, content: ContentInput): Promise<ContentVersion> {
        return this.execute('createBlock', ctx, { key, label: content.label, uri: content.uri, tag: content.tag }, (draft, emit) => {
            enforce(KeyGuard({ key }));
            if (own(draft.latestVersionId, key) !== undefined) {
                throw new LedgerError(ErrorCode.KEY_EXISTS, `Key ${key} already exists`, { key });
            }
            return this.record(draft, emit, ctx, key, 1, content, 'BlockCreated');
        });
    }

    public createNewVersion(ctx: CallContext, key: string, content: ContentInput): Promise<ContentVersion> {
        return this.execute('createNewVersion', ctx, { key, label: content.label, uri: content.uri, tag: content.tag }, (draft, emit) => {
            const latestId = requireEntity(own(draft.latestVersionId, key), `Key ${key}`, ErrorCode.KEY_NOT_FOUND);
            const latest = requireEntity(own(draft.versions, String(latestId)), `Version ${latestId}`);
            enforce(CreatorGuard({ actor: ctx.caller, creator: latest.creator, subject: `key ${key}` }));

            return this.record(draft, emit, ctx, key, latest.version + 1, content, 'VersionCreated');
        });
    }

    public setVersionActive(ctx: CallContext, versionId: number, active: boolean): Promise<void> {
        return this.execute('setVersionActive', ctx, { versionId, active }, (draft, emit) => {
            enforce(IdGuard({ id: versionId, subject: 'Version' }));
            const version = requireEntity(own(draft.versions, String(versionId)), `Version ${versionId}`);
            enforce(CreatorGuard({ actor: ctx.caller, creator: version.creator, subject: `version ${versionId}` }));

            version.isActive = active;
            emit('VersionStatusChanged', { versionId, isActive: active });
        });
    }

    public transferOwnership(ctx: CallContext, newOwner: Address): Promise<void> {
        return this.execute('transferOwnership', ctx, { newOwner }, (draft, emit) => {
            transferOwnership(draft, ctx.caller, newOwner, emit);
        });
    }

    private record(
        draft: {
            nextVersionId: number;
            versions: Record<string, ContentVersion>;
            latestVersionId: Record<string, number>;
            versionsByKey: Record<string, number[]>;
            versionsByCreator: Record<Address, number[]>;
        },
        emit: Emit,
        ctx: CallContext,
        key: string,
        version: number,
        content: ContentInput,
        event: 'BlockCreated' | 'VersionCreated'
    ): ContentVersion {
        const versionId = draft.nextVersionId;
        const entry: ContentVersion = {
            versionId,
            key,
            version,
            label: content.label,
            contentURI: content.uri,
            tag: content.tag,
            creator: ctx.caller,
            createdAt: ctx.timestamp,
            isActive: true
        };

        draft.nextVersionId = versionId + 1;
        draft.versions[String(versionId)] = entry;
        draft.latestVersionId[key] = versionId;
        appendIndex(draft.versionsByKey, key, versionId);
        appendIndex(draft.versionsByCreator, ctx.caller, versionId);

        emit(event, { versionId, key, version, creator: ctx.caller });
        return entry;
    }

    // --- Queries ---

    public owner(): Address { return this.model.state.owner; }

    public getVersion(versionId: number): ContentVersion | null {
        return own(this.model.state.versions, String(versionId)) ?? null;
    }

    public getLatestVersion(key: string): ContentVersion | null {
        const id = own(this.model.state.latestVersionId, key);
        return id === undefined ? null : this.getVersion(id);
    }

    /** Version ids under the key, oldest first. */
    public getVersionsOf(key: string): number[] {
        return [...(own(this.model.state.versionsByKey, key) ?? [])];
    }

    public getVersionsByCreator(creator: Address): number[] {
        return [...(own(this.model.state.versionsByCreator, creator) ?? [])];
    }

    public totalVersions(): number { return this.model.state.nextVersionId - 1; }

    protected dispatch(operation: string, args: CallArgs, ctx: CallContext): Promise<unknown> {
        const content = (): ContentInput => ({
            label: argString(args, 'label'),
            uri: argString(args, 'uri'),
            tag: argString(args, 'tag')
        });

        switch (operation) {
            case 'createBlock': return this.createBlock(ctx, argString(args, 'key'), content());
            case 'createNewVersion': return this.createNewVersion(ctx, argString(args, 'key'), content());
            case 'setVersionActive': return this.setVersionActive(ctx, argNumber(args, 'versionId'), argBoolean(args, 'active'));
            case 'transferOwnership': return this.transferOwnership(ctx, argString(args, 'newOwner'));
            default: return unknownOperation(this.name, operation);
        }
    }
}

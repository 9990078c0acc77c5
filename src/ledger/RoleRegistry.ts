import { InvalidInputError, NotAuthorizedError } from '../errors';
import { LedgerEventType, RoleChanged } from '../models/LedgerEvent';
import { Role } from '../models/Role';
import { requireText } from '../validation';
import { LedgerServices } from './LedgerServices';
import { MemberListSchema } from './schemas';

export class RoleRegistry {
    constructor(private readonly services: LedgerServices) {}

    async members(role: Role): Promise<string[]> {
        const { state } = this.services;
        return (await state.read(state.key('role', role), MemberListSchema)) ?? [];
    }

    // Identities are compared trimmed, the same way setRole stores them.
    async hasRole(role: Role, identity: string): Promise<boolean> {
        return (await this.members(role)).includes(identity.trim());
    }

    async requireRole(role: Role, identity: string): Promise<void> {
        if (!(await this.hasRole(role, identity))) {
            this.services.logger.warn('Rejected caller without required role', { role, identity });
            throw new NotAuthorizedError(role, identity);
        }
    }

    // Seeds the first admin. Only possible while the admin group is empty.
    async initialize(admin: string): Promise<RoleChanged> {
        return this.services.guard.run('initializeRoles', async () => {
            const identity = requireText('admin identity', admin);
            if ((await this.members(Role.ADMIN)).length > 0) {
                throw new InvalidInputError('Ledger is already initialized');
            }
            await this.store(Role.ADMIN, [identity]);
            this.services.logger.info('Seeded admin role', { admin: identity });
            return this.emitChange(Role.ADMIN, identity, identity, true);
        });
    }

    /**
     * Grants or revokes a role. Repeating a grant or revoking an absent membership changes
     * nothing but still succeeds and still emits RoleChanged.
     */
    async setRole(caller: string, role: Role, identity: string, granted: boolean): Promise<RoleChanged> {
        return this.services.guard.run('setRole', async () => {
            await this.requireRole(Role.ADMIN, caller);
            const subject = requireText('identity', identity);

            const members = await this.members(role);
            const isMember = members.includes(subject);

            if (granted && !isMember) {
                await this.store(role, [...members, subject]);
            } else if (!granted && isMember) {
                if (role === Role.ADMIN && members.length === 1) {
                    throw new InvalidInputError('The last admin cannot be revoked');
                }
                await this.store(role, members.filter((member) => member !== subject));
            }

            this.services.logger.info(granted ? 'Granted role' : 'Revoked role', {
                role,
                subject,
                caller,
                changed: granted !== isMember
            });
            return this.emitChange(role, subject, caller, granted);
        });
    }

    grant(caller: string, role: Role, identity: string): Promise<RoleChanged> {
        return this.setRole(caller, role, identity, true);
    }

    revoke(caller: string, role: Role, identity: string): Promise<RoleChanged> {
        return this.setRole(caller, role, identity, false);
    }

    private async store(role: Role, members: string[]): Promise<void> {
        const { state } = this.services;
        await state.write(state.key('role', role), members);
    }

    private async emitChange(role: Role, subject: string, caller: string, granted: boolean): Promise<RoleChanged> {
        const change: RoleChanged = { type: LedgerEventType.ROLE_CHANGED, role, subject, caller, granted };
        await this.services.events.emit(change);
        return change;
    }
}

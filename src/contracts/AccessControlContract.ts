import { Transaction, Info, Returns } from 'fabric-contract-api';
import { parseFlag, parseRole } from '../validation';
import { BaseContract } from './BaseContract';
import { LedgerContext } from './LedgerContext';

@Info({ title: 'AccessControlContract', description: 'Ledger initialization and role membership' })
export class AccessControlContract extends BaseContract {

    constructor() {
        super('AccessControlContract');
    }

    // Caller becomes the first admin; default pricing rules are written alongside.
    @Transaction()
    async InitLedger(ctx: LedgerContext): Promise<void> {
        const client = ctx.getClient();
        await this.openLedger(ctx).initialize(client.id);
    }

    @Transaction()
    async SetRole(ctx: LedgerContext, role: string, identity: string, granted: string): Promise<void> {
        const client = ctx.getClient();
        await this.openLedger(ctx).roles.setRole(client.id, parseRole(role), identity, parseFlag('granted', granted));
    }

    @Transaction()
    async GrantRole(ctx: LedgerContext, role: string, identity: string): Promise<void> {
        const client = ctx.getClient();
        await this.openLedger(ctx).roles.grant(client.id, parseRole(role), identity);
    }

    @Transaction()
    async RevokeRole(ctx: LedgerContext, role: string, identity: string): Promise<void> {
        const client = ctx.getClient();
        await this.openLedger(ctx).roles.revoke(client.id, parseRole(role), identity);
    }

    @Transaction(false)
    @Returns('string')
    async HasRole(ctx: LedgerContext, role: string, identity: string): Promise<string> {
        const held = await this.openLedger(ctx).roles.hasRole(parseRole(role), identity);
        return JSON.stringify(held);
    }

    @Transaction(false)
    @Returns('string')
    async GetRoleMembers(ctx: LedgerContext, role: string): Promise<string> {
        return JSON.stringify(await this.openLedger(ctx).roles.members(parseRole(role)));
    }

    // Identities are granted by the id string this returns.
    @Transaction(false)
    @Returns('string')
    async GetCallerId(ctx: LedgerContext): Promise<string> {
        return JSON.stringify(ctx.getClient());
    }
}

import { Actor, HttpAgent } from '@dfinity/agent';
import type { ActorMethod, ActorSubclass } from '@dfinity/agent';
import type { IDL } from '@dfinity/candid';
import { Principal } from '@dfinity/principal';
import type { BalanceProvider } from '../../domain/index.js';

interface Icrc1Account {
  owner: Principal;
  subaccount: [] | [Uint8Array];
}

interface Icrc1Ledger {
  icrc1_balance_of: ActorMethod<[Icrc1Account], bigint>;
}

const icrc1IdlFactory: IDL.InterfaceFactory = ({ IDL }) => {
  const Account = IDL.Record({
    owner: IDL.Principal,
    subaccount: IDL.Opt(IDL.Vec(IDL.Nat8)),
  });
  return IDL.Service({
    icrc1_balance_of: IDL.Func([Account], [IDL.Nat], ['query']),
  });
};

export interface LedgerBalanceOptions {
  readonly host: string;
  readonly ledgerCanisterId: string;
}

/**
 * ICRC-1 ledger balance of a principal's default account, in the
 * ledger's base unit (e8s for ckBTC).
 *
 * The agent does not take an AbortSignal; the caller's deadline still
 * applies because the pipeline races every lookup against it.
 */
export class LedgerBalanceProvider implements BalanceProvider {
  readonly name = 'btc';
  readonly field = 'btc_balance_e8s';
  private readonly ledger: ActorSubclass<Icrc1Ledger>;

  constructor(options: LedgerBalanceOptions) {
    const agent = HttpAgent.createSync({ host: options.host });
    this.ledger = Actor.createActor<Icrc1Ledger>(icrc1IdlFactory, {
      agent,
      canisterId: options.ledgerCanisterId,
    });
  }

  async lookup(identity: string, _signal: AbortSignal): Promise<number> {
    const balance = await this.ledger.icrc1_balance_of({
      owner: Principal.fromText(identity),
      subaccount: [],
    });
    return Number(balance);
  }
}

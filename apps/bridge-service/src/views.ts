import { toHex } from "@idbridge/shared";
import type { DispatchOutcome } from "@idbridge/dispatch";
import type { CredentialRecord, StateHandle } from "@idbridge/registry";
import type { ProgramStateAccount } from "@idbridge/wire";

// u64 values go out as decimal strings.

export const programStateView = (state: StateHandle, account: ProgramStateAccount) => ({
  state,
  authority: account.authority,
  verificationCount: account.verificationCount.toString(),
  credentialCount: account.credentialCount.toString()
});

export const credentialView = (record: CredentialRecord) => ({
  handle: record.handle,
  hash: toHex(record.hash),
  isValid: record.isValid,
  owner: record.owner,
  revocationDate: record.revocationDate.toString()
});

export const outcomeView = (outcome: DispatchOutcome) => ({
  messageType: outcome.messageType,
  stage: outcome.stage,
  originChainId: outcome.originChainId,
  reply: outcome.reply
    ? {
        msgType: outcome.reply.envelope.msgType,
        messageId: toHex(outcome.reply.envelope.messageId),
        timestamp: outcome.reply.envelope.timestamp.toString(),
        destinationChainId: outcome.reply.destinationChainId,
        envelope: Buffer.from(outcome.reply.bytes).toString("base64")
      }
    : null,
  events: outcome.events.map((event) => event.type)
});

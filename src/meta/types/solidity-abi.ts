import type { Result } from 'neverthrow';
import { z } from 'zod';
import type { MetaDocumentItem } from '../document.js';
import type { MetaError } from '../errors.js';
import { jsonPayload, jsonToItem, parseWithSchema } from './shared.js';

export interface AbiParameter {
  readonly name: string;
  readonly type: string;
  readonly internalType?: string | undefined;
  readonly indexed?: boolean | undefined;
  readonly components?: readonly AbiParameter[] | undefined;
}

const AbiParameterSchema: z.ZodType<AbiParameter> = z.lazy(() =>
  z.object({
    name: z.string(),
    type: z.string().min(1),
    internalType: z.string().optional(),
    indexed: z.boolean().optional(),
    components: z.array(AbiParameterSchema).optional(),
  })
);

const AbiItemSchema = z.object({
  type: z.enum(['function', 'constructor', 'event', 'error', 'fallback', 'receive']),
  name: z.string().optional(),
  inputs: z.array(AbiParameterSchema).optional(),
  outputs: z.array(AbiParameterSchema).optional(),
  stateMutability: z.enum(['pure', 'view', 'nonpayable', 'payable']).optional(),
  anonymous: z.boolean().optional(),
});

/** A contract's JSON ABI as emitted by solc. */
export const SolidityAbiV2Schema = z.array(AbiItemSchema);

export type SolidityAbiItem = z.infer<typeof AbiItemSchema>;
export type SolidityAbiV2 = z.infer<typeof SolidityAbiV2Schema>;

export function solidityAbiV2FromItem(item: MetaDocumentItem): Result<SolidityAbiV2, MetaError> {
  return jsonPayload(item, 'solidity-abi-v2', SolidityAbiV2Schema);
}

export function solidityAbiV2ToItem(abi: SolidityAbiV2): Result<MetaDocumentItem, MetaError> {
  return parseWithSchema(SolidityAbiV2Schema, abi).map((valid) => jsonToItem(valid, 'solidity-abi-v2'));
}

// Codec
export type { KnownMagic } from './meta/magic.js';
export {
  MAGIC_VALUES,
  KNOWN_MAGICS,
  magicValue,
  magicToPrefixBytes,
  magicFromU64,
  magicFromName,
  hasMagicPrefix,
} from './meta/magic.js';
export type { ContentType, ContentEncoding, ContentLanguage } from './meta/content.js';
export { encodeContent, decodeContent } from './meta/content.js';
export type { MetaDocumentItem, MetaItemInit, MetaConverter } from './meta/document.js';
export {
  metaItem,
  itemsEqual,
  fieldCount,
  cborEncode,
  cborEncodeSeq,
  cborDecode,
  unpack,
  unpackInto,
  UNPACKABLE_MAGICS,
} from './meta/document.js';
export { itemHash, documentHash } from './meta/hashing.js';
export type { MetaError, MetaErrorCode } from './meta/errors.js';
export { hexToBytes, bytesToHex } from './meta/hex.js';
export { strToBytes32, bytes32ToStr } from './meta/bytes32.js';

// Typed meta
export type { TypedMeta, TypedMetaKind } from './meta/typed-meta.js';
export { magicOf, typedMetaFromItem, typedMetaToItem, parseFromHex } from './meta/typed-meta.js';
export type { AuthoringMetaV1, AuthoringMetaV2, AuthoringWordV1, AuthoringWordV2 } from './meta/types/authoring.js';
export type { OpMetaV1 } from './meta/types/op-meta.js';
export type { InterpreterCallerMetaV1 } from './meta/types/interpreter-caller-meta.js';
export type { SolidityAbiV2 } from './meta/types/solidity-abi.js';
export type { DotrainGuiStateV1, ValueCfg, TokenCfg } from './meta/types/dotrain-gui-state.js';
export { extractDotrainGuiState, tokenAddresses, chosenVaultIds } from './meta/types/dotrain-gui-state.js';
export type { DeploymentData, DeploymentDeps } from './meta/deployment.js';
export { generateDotrainDeployment } from './meta/deployment.js';

// Store
export type { MetaStoreDeps, MetaStoreContents, UpdateWithOutcome, SetDotrainResult } from './store/meta-store.js';
export { MetaStore, EMPTY_CONTENTS } from './store/meta-store.js';
export type { Npe2Deployer } from './store/npe2-deployer.js';
export { isDeployerCorrupt } from './store/npe2-deployer.js';
export type { MetaStoreSnapshot } from './store/snapshot.js';
export { toSnapshot, parseMetaStoreSnapshot } from './store/snapshot.js';

// Ports and adapters
export type { Keccak256Port } from './ports/keccak256.port.js';
export type { EmitMetaEncoderPort } from './ports/emit-meta-encoder.port.js';
export type {
  MetadataResolverPort,
  SubgraphEndpointClientPort,
  MetaResponse,
  DeployerResponse,
  ResolverError,
} from './ports/metadata-resolver.port.js';
export { NobleKeccak256 } from './infra/keccak256/index.js';
export { EthersEmitMetaEncoder } from './infra/ethers/emit-meta-encoder.js';
export { RacingMetadataResolver } from './infra/resolver/racing-resolver.js';

// Ambient
export type { AppConfig, ValidatedConfig } from './config/app-config.js';
export { loadConfig, createValidatedConfig } from './config/app-config.js';
export { formatAppError } from './errors/formatter.js';
export type { AppError } from './errors/app-error.js';
export { initializeContainer, resolveMetaStore, resolveDeploymentDeps } from './di/container.js';

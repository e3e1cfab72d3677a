export * from "./trie/Node";
export * as Nibbles from "./trie/NibbleSlice";
export { NibbleOutOfBoundsError } from "./trie/NibbleSlice";
export * from "./trie/encoding";
export * from "./trie/hash";
export * from "./trie/NodeCodec";
export * from "./proof/ProofNodeTable";
export * from "./proof/ProofVerifier";
export * from "./proof/AccountProof";

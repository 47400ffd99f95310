export { PublicKey, PUBLIC_KEY_Z32_LENGTH } from './public-key'
export { Keypair } from './keypair'

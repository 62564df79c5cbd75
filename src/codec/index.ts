/**
 * Wire Codec
 */

export { ByteReader, ByteWriter } from './binary';
export type { Packet, WelcomeMessage } from './packets';
export {
    PROTOCOL_MAGIC,
    PROTOCOL_VERSION,
    PacketType,
    encodeInput,
    encodeSnapshot,
    encodeAck,
    encodeWelcome,
    encodePacket,
    decodePacket
} from './packets';

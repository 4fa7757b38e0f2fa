import { ProtocolError } from '../errors.js';
import { CLASS_IN, EDNS_DO_BIT, EDNS_UDP_PAYLOAD_SIZE, RecordType } from './constants.js';
import { encodeName, normalizeName } from './name.js';

const HEADER_LENGTH = 12;
const MAX_POINTER_HOPS = 64;

export interface DnsFlags {
  qr: boolean;
  opcode: number;
  aa: boolean;
  tc: boolean;
  rd: boolean;
  ra: boolean;
  ad: boolean;
  cd: boolean;
}

export interface Question {
  name: string;
  type: number;
  class: number;
}

export interface ResourceRecord {
  name: string;
  type: number;
  class: number;
  ttl: number;
  /** Raw RDATA as it appeared on the wire */
  data: Buffer;
}

export interface DnsMessage {
  id: number;
  flags: DnsFlags;
  rcode: number;
  questions: Question[];
  answers: ResourceRecord[];
  authority: ResourceRecord[];
  additional: ResourceRecord[];
}

export interface QueryOptions {
  id?: number;
  dnssecOk?: boolean;
  checkingDisabled?: boolean;
  udpPayloadSize?: number;
}

const defaultFlags: DnsFlags = {
  qr: false,
  opcode: 0,
  aa: false,
  tc: false,
  rd: true,
  ra: false,
  ad: false,
  cd: false,
};

/**
 * Build a recursive query with an EDNS(0) OPT record.
 * DNSSEC OK and Checking Disabled are on unless turned off, so the upstream
 * returns signatures and leaves validation to us.
 */
export function buildQuery(name: string, type: number, options: QueryOptions = {}): DnsMessage {
  const dnssecOk = options.dnssecOk ?? true;
  return {
    id: options.id ?? Math.floor(Math.random() * 0x10000),
    flags: { ...defaultFlags, cd: options.checkingDisabled ?? true },
    rcode: 0,
    questions: [{ name: normalizeName(name), type, class: CLASS_IN }],
    answers: [],
    authority: [],
    additional: [
      {
        name: '.',
        type: RecordType.OPT,
        class: options.udpPayloadSize ?? EDNS_UDP_PAYLOAD_SIZE,
        ttl: dnssecOk ? EDNS_DO_BIT : 0,
        data: Buffer.alloc(0),
      },
    ],
  };
}

function encodeFlags(flags: DnsFlags, rcode: number): number {
  return (
    (flags.qr ? 0x8000 : 0) |
    ((flags.opcode & 0xf) << 11) |
    (flags.aa ? 0x0400 : 0) |
    (flags.tc ? 0x0200 : 0) |
    (flags.rd ? 0x0100 : 0) |
    (flags.ra ? 0x0080 : 0) |
    (flags.ad ? 0x0020 : 0) |
    (flags.cd ? 0x0010 : 0) |
    (rcode & 0xf)
  );
}

function decodeFlags(value: number): DnsFlags {
  return {
    qr: (value & 0x8000) !== 0,
    opcode: (value >> 11) & 0xf,
    aa: (value & 0x0400) !== 0,
    tc: (value & 0x0200) !== 0,
    rd: (value & 0x0100) !== 0,
    ra: (value & 0x0080) !== 0,
    ad: (value & 0x0020) !== 0,
    cd: (value & 0x0010) !== 0,
  };
}

function encodeRecord(record: ResourceRecord): Buffer {
  const fixed = Buffer.alloc(10);
  fixed.writeUInt16BE(record.type, 0);
  fixed.writeUInt16BE(record.class, 2);
  fixed.writeUInt32BE(record.ttl >>> 0, 4);
  fixed.writeUInt16BE(record.data.length, 8);
  return Buffer.concat([encodeName(record.name), fixed, record.data]);
}

/** Encode without name compression */
export function encodeMessage(message: DnsMessage): Buffer {
  const header = Buffer.alloc(HEADER_LENGTH);
  header.writeUInt16BE(message.id, 0);
  header.writeUInt16BE(encodeFlags(message.flags, message.rcode), 2);
  header.writeUInt16BE(message.questions.length, 4);
  header.writeUInt16BE(message.answers.length, 6);
  header.writeUInt16BE(message.authority.length, 8);
  header.writeUInt16BE(message.additional.length, 10);

  const parts: Buffer[] = [header];
  for (const question of message.questions) {
    const fixed = Buffer.alloc(4);
    fixed.writeUInt16BE(question.type, 0);
    fixed.writeUInt16BE(question.class, 2);
    parts.push(encodeName(question.name), fixed);
  }
  for (const record of [...message.answers, ...message.authority, ...message.additional]) {
    parts.push(encodeRecord(record));
  }
  return Buffer.concat(parts);
}

/**
 * Read a possibly compressed name starting at `offset`.
 * Pointers may only point backwards and are followed a bounded number of times.
 */
export function readName(buffer: Buffer, offset: number): { name: string; offset: number } {
  const labels: string[] = [];
  let position = offset;
  let end: number | null = null;
  let hops = 0;

  for (;;) {
    if (position >= buffer.length) {
      throw new ProtocolError('malformed', 'Name runs past end of message');
    }
    const length = buffer[position];

    if ((length & 0xc0) === 0xc0) {
      if (position + 1 >= buffer.length) {
        throw new ProtocolError('malformed', 'Truncated compression pointer');
      }
      const pointer = ((length & 0x3f) << 8) | buffer[position + 1];
      if (pointer >= position || ++hops > MAX_POINTER_HOPS) {
        throw new ProtocolError('malformed', 'Invalid compression pointer');
      }
      end ??= position + 2;
      position = pointer;
      continue;
    }
    if ((length & 0xc0) !== 0) {
      throw new ProtocolError('malformed', `Unsupported label type 0x${length.toString(16)}`);
    }

    position++;
    if (length === 0) {
      break;
    }
    if (position + length > buffer.length) {
      throw new ProtocolError('malformed', 'Label runs past end of message');
    }
    labels.push(buffer.toString('latin1', position, position + length).toLowerCase());
    position += length;
  }

  const name = labels.length === 0 ? '.' : `${labels.join('.')}.`;
  return { name, offset: end ?? position };
}

function readRecord(buffer: Buffer, offset: number): { record: ResourceRecord; offset: number } {
  const { name, offset: afterName } = readName(buffer, offset);
  if (afterName + 10 > buffer.length) {
    throw new ProtocolError('malformed', 'Truncated resource record header');
  }
  const type = buffer.readUInt16BE(afterName);
  const klass = buffer.readUInt16BE(afterName + 2);
  const ttl = buffer.readUInt32BE(afterName + 4);
  const length = buffer.readUInt16BE(afterName + 8);
  const dataStart = afterName + 10;
  if (dataStart + length > buffer.length) {
    throw new ProtocolError('malformed', 'Resource record data runs past end of message');
  }
  return {
    record: {
      name,
      type,
      class: klass,
      ttl,
      data: Buffer.from(buffer.subarray(dataStart, dataStart + length)),
    },
    offset: dataStart + length,
  };
}

export function decodeMessage(buffer: Buffer): DnsMessage {
  if (buffer.length < HEADER_LENGTH) {
    throw new ProtocolError('malformed', 'DNS message shorter than header');
  }
  const id = buffer.readUInt16BE(0);
  const rawFlags = buffer.readUInt16BE(2);
  const counts = [buffer.readUInt16BE(4), buffer.readUInt16BE(6), buffer.readUInt16BE(8), buffer.readUInt16BE(10)];

  let offset = HEADER_LENGTH;
  const questions: Question[] = [];
  for (let i = 0; i < counts[0]; i++) {
    const { name, offset: afterName } = readName(buffer, offset);
    if (afterName + 4 > buffer.length) {
      throw new ProtocolError('malformed', 'Truncated question');
    }
    questions.push({ name, type: buffer.readUInt16BE(afterName), class: buffer.readUInt16BE(afterName + 2) });
    offset = afterName + 4;
  }

  const sections: ResourceRecord[][] = [[], [], []];
  for (let section = 0; section < 3; section++) {
    for (let i = 0; i < counts[section + 1]; i++) {
      const result = readRecord(buffer, offset);
      sections[section].push(result.record);
      offset = result.offset;
    }
  }

  // Extended rcode bits live in the OPT record
  let rcode = rawFlags & 0xf;
  const opt = sections[2].find((record) => record.type === RecordType.OPT);
  if (opt) {
    rcode |= ((opt.ttl >>> 24) & 0xff) << 4;
  }

  return {
    id,
    flags: decodeFlags(rawFlags),
    rcode,
    questions,
    answers: sections[0],
    authority: sections[1],
    additional: sections[2],
  };
}

import protobuf from 'protobufjs';
import type { IConversionOptions } from 'protobufjs';

/**
 * Wire schema shared with storage nodes and the desktop client.
 *
 * `Envelope` is the inner record; `WebSocketMessage` is the transport frame
 * the envelope travels in as the body of a PUT request.
 */
const SCHEMA = `
syntax = "proto2";
package swarm;

message Envelope {
  enum Type {
    UNKNOWN = 0;
    CIPHERTEXT = 1;
    KEY_EXCHANGE = 2;
    PREKEY_BUNDLE = 3;
    RECEIPT = 5;
    UNIDENTIFIED_SENDER = 6;
    FRIEND_REQUEST = 101;
  }
  optional Type   type         = 1;
  optional string source       = 2;
  optional uint32 sourceDevice = 7;
  optional string relay        = 3;
  optional uint64 timestamp    = 5;
  optional bytes  legacyMessage = 6;
  optional bytes  content      = 8;
}

message WebSocketRequestMessage {
  optional string verb    = 1;
  optional string path    = 2;
  optional bytes  body    = 3;
  repeated string headers = 5;
  optional uint64 id      = 4;
}

message WebSocketResponseMessage {
  optional uint64 id      = 1;
  optional uint32 status  = 2;
  optional string message = 3;
  repeated string headers = 5;
  optional bytes  body    = 4;
}

message WebSocketMessage {
  enum Type {
    UNKNOWN  = 0;
    REQUEST  = 1;
    RESPONSE = 2;
  }
  optional Type                     type     = 1;
  optional WebSocketRequestMessage  request  = 2;
  optional WebSocketResponseMessage response = 3;
}
`;

const root = protobuf.parse(SCHEMA, { keepCase: true }).root;

export const EnvelopeProto = root.lookupType('swarm.Envelope');
export const WebSocketMessageProto = root.lookupType('swarm.WebSocketMessage');

/** Conversion used whenever a decoded message is read back as plain data */
export const PLAIN_CONVERSION: IConversionOptions = {
  longs: Number,
  enums: String,
};

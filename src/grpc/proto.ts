import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { fileURLToPath } from 'url';

export const PROTO_PATH = fileURLToPath(new URL('../../proto/control_plane.proto', import.meta.url));

// Must be identical on both ends
const LOADER_OPTIONS: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

type DescriptorEntry = grpc.GrpcObject[string];

function isGrpcObject(entry: DescriptorEntry | undefined): entry is grpc.GrpcObject {
  return typeof entry === 'object' && entry !== null && !('format' in entry);
}

function isServiceConstructor(entry: DescriptorEntry | undefined): entry is grpc.ServiceClientConstructor {
  return typeof entry === 'function' && 'service' in entry;
}

export async function loadControlPlaneService(): Promise<grpc.ServiceClientConstructor> {
  const packageDefinition = await protoLoader.load(PROTO_PATH, LOADER_OPTIONS);
  const descriptor = grpc.loadPackageDefinition(packageDefinition);

  const pkg = descriptor.controlplane;
  if (!isGrpcObject(pkg)) {
    throw new Error(`Package controlplane not found in ${PROTO_PATH}`);
  }
  const service = pkg.ControlPlaneService;
  if (!isServiceConstructor(service)) {
    throw new Error(`Service ControlPlaneService not found in ${PROTO_PATH}`);
  }
  return service;
}

export type VmId = string;
export type ServerId = string;

export type VirtualMachine = {
  id: VmId;
  server: ServerId;
};

export type CloudServer = {
  id: ServerId;
  vms: readonly VmId[];
};

export type Topology = {
  servers: readonly CloudServer[];
  // servers in document order, then VMs within each server in document order
  vms: readonly VirtualMachine[];
  serverByVm: ReadonlyMap<VmId, ServerId>;
};

export function createTopology(servers: readonly CloudServer[]): Topology {
  const vms: VirtualMachine[] = [];
  const serverByVm = new Map<VmId, ServerId>();
  for (const server of servers) {
    for (const id of server.vms) {
      vms.push({ id, server: server.id });
      serverByVm.set(id, server.id);
    }
  }
  return { servers, vms, serverByVm };
}

export function serverOf(topology: Topology, vm: VmId): ServerId | undefined {
  return topology.serverByVm.get(vm);
}

export function sameServer(topology: Topology, a: VmId, b: VmId): boolean {
  if (a === b) return true;
  const server = serverOf(topology, a);
  return server !== undefined && server === serverOf(topology, b);
}

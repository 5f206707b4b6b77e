export interface ObjectType {
  id: string;
  type_name: string;
  created?: string;
  updated?: string;
  deleted?: string;
  organization_id?: string;
}

export interface AuthzObject {
  id: string;
  type_id: string;
  alias?: string | null;
  created?: string;
  updated?: string;
  deleted?: string;
  organization_id?: string;
}

/**
 * How an attribute flows across an edge of a given type.
 * direct: the source holds the attribute on the target.
 * inherit: the source inherits the attributes the target holds.
 * propagate: holders of the attribute on the source also hold it on the target.
 */
export interface Attribute {
  name: string;
  direct: boolean;
  inherit: boolean;
  propagate: boolean;
}

export interface EdgeType {
  id: string;
  type_name: string;
  source_object_type_id: string;
  target_object_type_id: string;
  attributes: Attribute[];
  created?: string;
  updated?: string;
  deleted?: string;
  organization_id?: string;
}

export interface Edge {
  id: string;
  edge_type_id: string;
  source_object_id: string;
  target_object_id: string;
  created?: string;
  updated?: string;
  deleted?: string;
}

export interface Organization {
  id: string;
  name: string;
  region: string;
  created?: string;
  updated?: string;
  deleted?: string;
}

export interface ShapeMember {
  type: string;
  required: boolean;
}

export interface ShapeModel {
  members: Record<string, ShapeMember>;
}

export interface PaginationTrait {
  inputToken?: string;
  outputToken?: string;
  items?: string;
  pageSize?: string;
}

export interface ServiceOperationModel {
  name: string;
  input?: ShapeModel;
  output?: ShapeModel;
  pagination?: PaginationTrait;
  /** Set when a shape referenced by the operation could not be resolved. */
  error?: string;
}

export interface ServiceModel {
  namespace: string;
  operations: ServiceOperationModel[];
}

/**
 * Source of operation shapes for a namespace. Implementations read
 * pre-published API definitions instead of reflecting over clients.
 */
export interface ServiceModelLoader {
  listNamespaces(): Promise<string[]>;
  loadNamespace(namespace: string): Promise<ServiceModel>;
}

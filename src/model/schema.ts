/**
 * TypeBox schemas for the building model snapshot.
 * A snapshot is the read-only set of spaces, walls, windows and doors
 * exported from the model store, with their property sets, placements
 * and bounding volumes.
 */

import { Type, type Static } from '@sinclair/typebox';

// =============================================================================
// Basic Types
// =============================================================================

export const Vec3Schema = Type.Tuple([Type.Number(), Type.Number(), Type.Number()], {
  description: 'A 3D vector or coordinate as [x, y, z]',
});

export const Point2DSchema = Type.Tuple([Type.Number(), Type.Number()], {
  description: 'A 2D plan coordinate as [x, y]',
});

export const Box3Schema = Type.Object(
  {
    min: Vec3Schema,
    max: Vec3Schema,
  },
  {
    description: 'Axis-aligned bounding volume in model coordinates',
    additionalProperties: false,
  }
);

export const ElementIdSchema = Type.String({
  description: 'Unique element identifier (e.g. the GlobalId)',
  minLength: 1,
});

export const PropertyValueSchema = Type.Union([Type.String(), Type.Number(), Type.Boolean(), Type.Null()], {
  description: 'Nominal value of a single property',
});

export const PropertySetSchema = Type.Object(
  {
    name: Type.String({ minLength: 1, description: 'Property set name (e.g. "PSet_Revit_Dimensions")' }),
    properties: Type.Record(Type.String(), PropertyValueSchema, {
      description: 'Property values keyed by property name',
    }),
  },
  {
    description: 'A named group of properties attached to an element',
    additionalProperties: false,
  }
);

// =============================================================================
// Space Profiles
// =============================================================================

export const RectangleProfileSchema = Type.Object(
  {
    kind: Type.Literal('rectangle'),
    xDim: Type.Number({ minimum: 0 }),
    yDim: Type.Number({ minimum: 0 }),
  },
  {
    description: 'Rectangular plan profile with its dimensions given directly',
    additionalProperties: false,
  }
);

export const PolygonProfileSchema = Type.Object(
  {
    kind: Type.Literal('polygon'),
    points: Type.Array(Point2DSchema),
  },
  {
    description: 'Arbitrary closed plan profile given by its outer curve vertices',
    additionalProperties: false,
  }
);

export const ProfileSchema = Type.Union([RectangleProfileSchema, PolygonProfileSchema], {
  description: 'Plan profile of a space',
});

// =============================================================================
// Elements
// =============================================================================

const elementFields = {
  id: ElementIdSchema,
  name: Type.String({ description: 'Element name' }),
  tag: Type.Optional(Type.String({ description: 'Element tag' })),
  bounds: Box3Schema,
  propertySets: Type.Optional(Type.Array(PropertySetSchema)),
};

export const SpaceSchema = Type.Object(
  {
    ...elementFields,
    longName: Type.String({ description: 'Descriptive name of the space (e.g. "Bedroom")' }),
    profile: ProfileSchema,
    boundedBy: Type.Optional(
      Type.Array(ElementIdSchema, { description: 'Ids of the building elements bounding this space' })
    ),
  },
  {
    description: 'A room. "name" carries the unique room code (e.g. "A203")',
    additionalProperties: false,
  }
);

export const PlacementFrameSchema = Type.Union(
  [Type.Literal('as-given'), Type.Literal('mirrored-along-wall-axis')],
  {
    description:
      'How window placements on this wall are measured. as-given: from the drawing-start corner. mirrored-along-wall-axis: from the far end.',
  }
);

export const MaterialLayerSchema = Type.Object(
  {
    material: Type.String(),
    thickness: Type.Number({ minimum: 0 }),
  },
  { additionalProperties: false }
);

export const WallSchema = Type.Object(
  {
    ...elementFields,
    refDirection: Type.Optional(Vec3Schema),
    placementFrame: Type.Optional(PlacementFrameSchema),
    materialLayers: Type.Optional(Type.Array(MaterialLayerSchema)),
  },
  {
    description: 'A wall. refDirection is the local x-axis of its placement; absent means the zero vector',
    additionalProperties: false,
  }
);

export const WindowSchema = Type.Object(
  {
    ...elementFields,
    location: Vec3Schema,
  },
  {
    description: 'A window. location is the origin of its placement relative to the host wall',
    additionalProperties: false,
  }
);

export const DoorSchema = Type.Object(
  {
    ...elementFields,
    overallWidth: Type.Number({ minimum: 0 }),
    overallHeight: Type.Number({ minimum: 0 }),
  },
  {
    description: 'A door',
    additionalProperties: false,
  }
);

// =============================================================================
// Model Snapshot
// =============================================================================

export const ModelSnapshotSchema = Type.Object(
  {
    name: Type.Optional(Type.String({ description: 'Model or project name' })),
    spaces: Type.Array(SpaceSchema),
    walls: Type.Array(WallSchema),
    windows: Type.Array(WindowSchema),
    doors: Type.Optional(Type.Array(DoorSchema)),
  },
  {
    $schema: 'https://json-schema.org/draft/2020-12/schema',
    title: 'roomgeo Model Snapshot',
    description:
      'Read-only snapshot of the rooms, walls, windows and doors of a single-story building model.',
    additionalProperties: false,
  }
);

// =============================================================================
// Type Exports (derived from schemas)
// =============================================================================

export type PropertyValue = Static<typeof PropertyValueSchema>;
export type PropertySet = Static<typeof PropertySetSchema>;
export type RectangleProfile = Static<typeof RectangleProfileSchema>;
export type PolygonProfile = Static<typeof PolygonProfileSchema>;
export type Profile = Static<typeof ProfileSchema>;
export type SpaceEntity = Static<typeof SpaceSchema>;
export type PlacementFrame = Static<typeof PlacementFrameSchema>;
export type MaterialLayer = Static<typeof MaterialLayerSchema>;
export type WallEntity = Static<typeof WallSchema>;
export type WindowEntity = Static<typeof WindowSchema>;
export type DoorEntity = Static<typeof DoorSchema>;
export type ModelSnapshot = Static<typeof ModelSnapshotSchema>;

export type ModelElement = SpaceEntity | WallEntity | WindowEntity | DoorEntity;

/**
 * TypeBox schema for reconciliation settings.
 * Every field has a default, so an empty object is a complete configuration.
 */

import { Type, type Static } from '@sinclair/typebox';

function propertyPath(defaultPath: string) {
  return Type.String({
    pattern: '^[^.]+\\..+$',
    default: defaultPath,
    description: 'Property lookup path in the form "PropertySet.Property"',
  });
}

export const PropertyPathsSchema = Type.Object(
  {
    windowWidth: propertyPath('PSet_Revit_Type_Dimensions.Width'),
    windowHeight: propertyPath('PSet_Revit_Type_Dimensions.Height'),
    sillHeight: propertyPath('PSet_Revit_Constraints.Sill Height'),
    wallLength: propertyPath('PSet_Revit_Dimensions.Length'),
    roomHeight: propertyPath('PSet_Revit_Dimensions.Unbounded Height'),
  },
  {
    description: 'Where dimensions are read from in element property sets',
    additionalProperties: false,
    default: {},
  }
);

export const WallSelectionSchema = Type.Union([Type.Literal('nearest-plane'), Type.Literal('last-candidate')], {
  description:
    'How a supporting wall is chosen among the walls near an opening. nearest-plane: closest wall centre plane to the opening centroid. last-candidate: the last wall returned by the spatial query.',
  default: 'nearest-plane',
});

export const ReconcileConfigSchema = Type.Object(
  {
    defaultSillHeight: Type.Number({
      minimum: 0,
      default: 0.1,
      description: 'Sill height (m) used when a window does not carry one',
    }),
    excludedRoomNames: Type.Array(Type.String(), {
      default: ['Hallway', 'Roof'],
      description: 'Descriptive room names that are not analyzed (circulation and roof spaces)',
    }),
    roomSearchMargin: Type.Number({
      minimum: 0,
      default: 0.5,
      description: 'Margin added around a room volume when searching for its windows and doors',
    }),
    wallSearchMargin: Type.Number({
      minimum: 0,
      default: 0.5,
      description: 'Margin added around an opening volume when searching for its wall',
    }),
    wallSelection: WallSelectionSchema,
    wallPlaneTolerance: Type.Number({
      minimum: 0,
      default: 0.5,
      description: 'Maximum distance from an opening centroid to a wall centre plane for nearest-plane selection',
    }),
    orientationToleranceDeg: Type.Number({
      minimum: 0,
      maximum: 45,
      default: 1,
      description: 'Angular tolerance when matching a wall direction to a cardinal axis (0 = the vector must equal the unit axis; otherwise any length matches)',
    }),
    properties: PropertyPathsSchema,
  },
  {
    title: 'roomgeo Reconcile Config',
    additionalProperties: false,
  }
);

export type PropertyPaths = Static<typeof PropertyPathsSchema>;
export type WallSelection = Static<typeof WallSelectionSchema>;
export type ReconcileConfig = Static<typeof ReconcileConfigSchema>;

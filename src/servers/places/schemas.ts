import { z } from 'zod';

export const PlaceSchema = z.object({
  place_id: z.string().optional(),
  name: z.string().optional(),
  rating: z.number().optional(),
  price_level: z.number().optional(),
  vicinity: z.string().optional(),
  types: z.array(z.string()).default([]),
  geometry: z
    .object({
      location: z.object({ lat: z.number(), lng: z.number() }).optional(),
    })
    .optional(),
});

export const NearbySearchResponseSchema = z.object({
  status: z.string().optional(),
  error_message: z.string().optional(),
  results: z.array(PlaceSchema).default([]),
});

// Photon answers with GeoJSON; coordinates are [lng, lat].
export const PhotonFeatureSchema = z.object({
  geometry: z.object({ coordinates: z.tuple([z.number(), z.number()]) }),
  properties: z
    .object({
      name: z.string().optional(),
      street: z.string().optional(),
      housenumber: z.string().optional(),
      city: z.string().optional(),
      postcode: z.string().optional(),
      country: z.string().optional(),
      osm_id: z.number().optional(),
    })
    .default({}),
});

export const PhotonResponseSchema = z.object({
  type: z.string().optional(),
  features: z.array(PhotonFeatureSchema).default([]),
});

export type Place = z.infer<typeof PlaceSchema>;
export type GeocodedPlace = z.infer<typeof PhotonFeatureSchema>;
export type PhotonResponse = z.infer<typeof PhotonResponseSchema>;

/** A place picked for a recommendation, tagged with the category it was found under. */
export interface RecommendedPlace extends Place {
  category: string;
  distanceKm?: number;
}

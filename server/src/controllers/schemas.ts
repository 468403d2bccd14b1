/**
 * Request DTOs for the /api/v1 surface
 */

import { z } from 'zod';
import { PLACE_CATEGORIES, PLACE_INTERACTIONS, PRICE_RANGES, type Place } from '../services/recommendations/types.js';

export const UserIdSchema = z.string().trim().min(1).max(128);

export const GeoPointSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180)
});

export const GenerateRecommendationsSchema = z.object({
  userId: UserIdSchema,
  location: GeoPointSchema
});

export const MorePlacesSchema = z.object({
  location: GeoPointSchema
});

const PlaceSchema = z.object({
  id: z.string().min(1),
  googlePlaceId: z.string().min(1).optional(),
  name: z.string().min(1),
  description: z.string().default(''),
  address: z.string().default(''),
  category: z.enum(PLACE_CATEGORIES),
  rating: z.number().min(0).max(5).default(0),
  reviewCount: z.number().int().nonnegative().default(0),
  priceRange: z.enum(PRICE_RANGES).default('$$'),
  descriptiveTags: z.array(z.string()).default([]),
  coordinates: z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180)
  }).optional(),
  images: z.array(z.string()).default([]),
  isCurrentlyOpen: z.boolean().default(true)
}).transform((place): Place => ({ ...place, isDemo: place.googlePlaceId === undefined }));

export const RecordInteractionSchema = z.object({
  userId: UserIdSchema,
  place: PlaceSchema,
  interaction: z.enum(PLACE_INTERACTIONS),
  location: GeoPointSchema.optional()
});

export const RadiusSchema = z.object({
  radiusMiles: z.number().positive().max(100)
});

export const OnboardingSchema = z.object({
  responses: z.array(z.object({
    questionId: z.string().min(1),
    selectedOptions: z.array(z.string())
  }))
});


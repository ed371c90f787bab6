import { z } from 'zod';

const text = z.string().nullable().optional();
const amount = z.union([z.number(), z.string()]).nullable().optional();

export const AccommodationSchema = z.object({
  hotel_id: z.union([z.number(), z.string()]).optional(),
  name: text,
  star_rating: amount,
  accommodation_type_name: text,
  price: z
    .object({
      amount,
      currency: text,
    })
    .optional(),
});

export const SearchResponseSchema = z.object({
  results: z.array(AccommodationSchema).default([]),
  total_results: z.number().optional(),
});

export const DetailsResponseSchema = z.object({
  result: z
    .object({
      name: text,
      star_rating: amount,
      accommodation_type_name: text,
      address: z
        .object({
          address_line_1: text,
          city: text,
          country: text,
        })
        .optional(),
      contact: z.object({ phone: text }).optional(),
      description: z.object({ short_description: text }).optional(),
      amenities: z.array(z.object({ name: text })).default([]),
      photos: z.array(z.object({ url_original: text })).default([]),
      url: text,
    })
    .nullable()
    .optional(),
});

export const ReviewsResponseSchema = z.object({
  result: z
    .object({
      average_score: z.number().nullable().optional(),
      review_count: z.number().nullable().optional(),
      reviews: z
        .array(
          z.object({
            score: amount,
            positive: text,
          })
        )
        .default([]),
    })
    .nullable()
    .optional(),
});

export type Accommodation = z.infer<typeof AccommodationSchema>;
export type SearchResponse = z.infer<typeof SearchResponseSchema>;
export type DetailsResponse = z.infer<typeof DetailsResponseSchema>;
export type ReviewsResponse = z.infer<typeof ReviewsResponseSchema>;

// Record shape returned to clients: public field names, ISO timestamps,
// `many` relationships embedded as arrays of child records.
export type EntityItemDto = Record<string, unknown>;

export interface ListEntitiesResponseDto {
  data: EntityItemDto[];
  total: number;
  page: number;
  per_page: number;
}

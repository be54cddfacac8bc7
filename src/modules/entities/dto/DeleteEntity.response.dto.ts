export interface DeleteEntityResponseDto {
  deleted: true;
}

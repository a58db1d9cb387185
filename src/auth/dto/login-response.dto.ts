export interface LoginResponseDto {
  accessToken: string;
  address: string;
}

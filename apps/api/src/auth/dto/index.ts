export { LoginDto } from './login.dto';
export { RegisterDto } from './register.dto';
export { AuthResponseDto } from './auth-response.dto';
export { UserProfileDto } from './user-profile.dto';

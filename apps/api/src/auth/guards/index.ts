export { SessionGuard } from './session.guard';

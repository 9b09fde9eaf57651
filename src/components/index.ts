export { GlassView } from './GlassView';

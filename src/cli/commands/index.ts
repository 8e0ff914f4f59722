export { serveCommand } from './serve'

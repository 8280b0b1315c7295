export { RecorderCard } from './RecorderCard'

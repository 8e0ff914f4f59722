export * from '@/types/schema'

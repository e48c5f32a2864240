import api from './api'
import type { RenderPlan, RenderRequest } from '../types'

export const fetchRenderPlan = async (request: RenderRequest): Promise<RenderPlan> => {
  const response = await api.post<{ plan: RenderPlan }>('/dashboard/render', request)
  return response.data.plan
}

export const reconnectWarehouse = async (): Promise<void> => {
  await api.post('/dashboard/reconnect')
}

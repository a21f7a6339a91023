export { authMiddleware, safeEqual } from './auth.js';
export { requestIdMiddleware } from './requestId.js';

export { OrderEntity } from './order.entity';
export { OrderNoteEntity } from './order-note.entity';

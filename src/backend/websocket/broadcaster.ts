import type WebSocket from 'ws';
import type { BookService } from '../books';
import type { GoalsService } from '../goals';
import type { SessionService } from '../sessions';
import type { ReadingSessionTracker } from '../tracker';
import type { ActiveSession, BackendEvent, Book, Goals, ReadingSession } from '@shared/types';
import { logger } from '@shared/logger';

export type WebSocketBroadcasterContext = {
    books: BookService;
    sessions: SessionService;
    goals: GoalsService;
    tracker: ReadingSessionTracker;
};

export class WebSocketBroadcaster {
    private clients = new Set<WebSocket>();

    constructor(private ctx: WebSocketBroadcasterContext) {
        this.setupLibraryListeners();
        this.setupSessionListeners();
    }

    private setupLibraryListeners() {
        const { books, goals } = this.ctx;
        books.on('added', (book: Book) => this.broadcast({ type: 'books-changed', payload: { reason: 'added', id: book.id } }));
        books.on('updated', (book: Book) => this.broadcast({ type: 'books-changed', payload: { reason: 'updated', id: book.id } }));
        books.on('removed', ({ id }: { id: number }) => this.broadcast({ type: 'books-changed', payload: { reason: 'removed', id } }));
        goals.on('updated', (payload: Goals) => this.broadcast({ type: 'goals-changed', payload }));
    }

    private setupSessionListeners() {
        const { sessions, tracker } = this.ctx;
        sessions.on('added', (session: ReadingSession) => this.broadcast({ type: 'sessions-changed', payload: { reason: 'added', id: session.id } }));
        tracker.on('started', (payload: ActiveSession) => this.broadcast({ type: 'session-started', payload }));
        tracker.on('stopped', (payload: ReadingSession) => this.broadcast({ type: 'session-stopped', payload }));
    }

    broadcast(event: BackendEvent) {
        const payload = JSON.stringify(event);
        for (const client of this.clients) {
            if (client.readyState === client.OPEN) {
                client.send(payload);
            }
        }
    }

    handleConnection(socket: WebSocket) {
        this.clients.add(socket);
        logger.info('WS client connected', this.clients.size);

        socket.on('close', () => {
            this.clients.delete(socket);
        });
    }

    get clientCount() {
        return this.clients.size;
    }
}

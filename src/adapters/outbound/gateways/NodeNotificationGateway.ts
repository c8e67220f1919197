import notifier from 'node-notifier';
import { INotificationPort } from '../../../application/ports/outbound/INotificationPort';
import { ILogger } from '../../../application/ports/outbound/ILogger';

export class NodeNotificationGateway implements INotificationPort {
    constructor(private readonly logger: ILogger) {}

    notify(title: string, message: string): void {
        notifier.notify({
            title,
            message,
            sound: true,
        }, (err) => {
            if (err) {
                this.logger.warn(`Desktop notification failed: ${err.message}`);
            }
        });
    }
}

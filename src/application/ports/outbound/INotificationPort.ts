export interface INotificationPort {
    notify(title: string, message: string): void;
}

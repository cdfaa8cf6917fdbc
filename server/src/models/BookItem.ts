export type BookItemType = 'folder' | 'file';

export interface BookItem {
    item_name: string;
    full_path: string;
    author: string;
    title: string;
    search_query: string;
    type: BookItemType;
}

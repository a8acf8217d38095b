export interface TextContent {
    type: "text";
    text: string;
}

export interface ServerResult {
    content: TextContent[];
    isError?: boolean;
    [key: string]: unknown;
}

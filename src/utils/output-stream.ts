//----------------------------------------------------------------------------------------------------------------------
// Base class for all output streams
//----------------------------------------------------------------------------------------------------------------------

export abstract class OutputStream {

    public log(...data: (string | object)[]) {
        this.doLog(OutputStream.stringify(data).join(" "));
    }

    //------------------------------------------------------------------------------------------------------------------
    // Log a line and indent all subsequent lines with the given padding
    //------------------------------------------------------------------------------------------------------------------

    public logAligned(padding: string, ...data: (string | object)[]) {
        this.doLog(OutputStream.stringify(data).join(" ").replace(/\r?\n/g, padding));
    }

    private static stringify(data: (string | object)[]) {
        return data.map(item => "object" === typeof item ? JSON.stringify(item, undefined, 4) : `${item}`);
    }

    protected abstract doLog(data: string): void;
}

//----------------------------------------------------------------------------------------------------------------------
// A muted output stream
//----------------------------------------------------------------------------------------------------------------------

export class NullOutputStream extends OutputStream {
    protected doLog(_data: string) {
        // supress all output
    }
}

//----------------------------------------------------------------------------------------------------------------------
// A console output stream (stdout)
//----------------------------------------------------------------------------------------------------------------------

export class ConsoleOutputStream extends OutputStream {
    protected doLog(line: string) {
        console.log(line);
    }
}

//----------------------------------------------------------------------------------------------------------------------
// An output stream that keeps all lines in memory
//----------------------------------------------------------------------------------------------------------------------

export class MemoryOutputStream extends OutputStream {

    private readonly collectedLines = new Array<string>();

    protected doLog(line: string) {
        this.collectedLines.push(line);
    }

    public get lines(): readonly string[] {
        return this.collectedLines;
    }
}

import { v2 as cloudinary, type UploadApiResponse } from "cloudinary";
import type { IncomingAttachment } from "../types/helpdesk";
import { StorageError, errorMessage } from "../utils/errors";

export type BlobUpload = IncomingAttachment & { chatId: string };

/** Where attachment bytes live. Records only keep the returned handle. */
export interface BlobStore {
  put(file: BlobUpload): Promise<string>;
  delete(fileRef: string): Promise<void>;
  urlFor(fileRef: string): string;
}

type ResourceType = "image" | "video" | "raw";

function isResourceType(value: string): value is ResourceType {
  return value === "image" || value === "video" || value === "raw";
}

// fileRef = "<resourceType>/<publicId>"; destroy and url need both parts
function parseFileRef(fileRef: string): { resourceType: ResourceType; publicId: string } {
  const slash = fileRef.indexOf("/");
  const resourceType = fileRef.slice(0, slash);
  const publicId = fileRef.slice(slash + 1);
  if (slash <= 0 || !publicId || !isResourceType(resourceType)) {
    throw new StorageError(`Malformed attachment reference: ${fileRef}`);
  }
  return { resourceType, publicId };
}

export type CloudinaryBlobStoreOptions = {
  cloudName?: string;
  apiKey?: string;
  apiSecret?: string;
  folder: string;
};

export class CloudinaryBlobStore implements BlobStore {
  private configured = false;

  constructor(private readonly options: CloudinaryBlobStoreOptions) {}

  // Credentials are checked on first use so the API still boots without them.
  private client(): typeof cloudinary {
    if (this.configured) return cloudinary;
    const { cloudName, apiKey, apiSecret } = this.options;
    if (!cloudName || !apiKey || !apiSecret) {
      throw new StorageError(
        "Attachment storage is not configured. Set CLOUDINARY_CLOUD_NAME, CLOUDINARY_API_KEY, CLOUDINARY_API_SECRET."
      );
    }
    cloudinary.config({ cloud_name: cloudName, api_key: apiKey, api_secret: apiSecret, secure: true });
    this.configured = true;
    return cloudinary;
  }

  async put(file: BlobUpload): Promise<string> {
    const cld = this.client();
    try {
      const result = await new Promise<UploadApiResponse>((resolve, reject) => {
        const stream = cld.uploader.upload_stream(
          {
            folder: `${this.options.folder}/${file.chatId}`,
            resource_type: "auto",
            type: "authenticated",
          },
          (error, res) => {
            if (error || !res) return reject(error ?? new Error("Empty upload response"));
            resolve(res);
          }
        );
        stream.end(file.data);
      });
      return `${result.resource_type}/${result.public_id}`;
    } catch (err) {
      throw new StorageError(`Upload of "${file.filename}" failed: ${errorMessage(err)}`, err);
    }
  }

  async delete(fileRef: string): Promise<void> {
    const { resourceType, publicId } = parseFileRef(fileRef);
    const cld = this.client();
    const res: { result?: string } = await cld.uploader.destroy(publicId, {
      resource_type: resourceType,
      type: "authenticated",
      invalidate: true,
    });
    if (res.result !== "ok" && res.result !== "not found") {
      throw new StorageError(`Cloudinary refused to delete ${fileRef}: ${String(res.result)}`);
    }
  }

  urlFor(fileRef: string): string {
    const { resourceType, publicId } = parseFileRef(fileRef);
    return this.client().url(publicId, {
      secure: true,
      resource_type: resourceType,
      type: "authenticated",
      sign_url: true,
    });
  }
}
